import type { EntityFetcher } from '../api/fetcher.js';
import type { RecordWriter } from '../store/writer.js';
import type { SchemaProvisioner } from '../store/provisioner.js';
import { BrokerUnavailableError } from '../errors.js';
import { ProgressTracker } from '../utils/progress.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { KNOWN_ENTITY_TYPES } from './catalog.js';
import { parseEntities } from './parser.js';

export type PipelineState = 'init' | 'connecting' | 'provisioning' | 'ingesting' | 'idle' | 'stopped' | 'failed';

export interface TypeSummary {
  type: string;
  /** What the broker reported up front; informational only. */
  expected: number;
  fetched: number;
  parsed: number;
  written: number;
}

export interface PipelineSummary {
  totalWritten: number;
  types: TypeSummary[];
}

export interface PipelineOptions {
  batchSize: number;
  entityTypes?: readonly string[];
  logger?: Logger;
}

type ProgressCallback = (summary: string) => void;

export class Pipeline {
  private currentState: PipelineState = 'init';
  private onProgressCallback?: ProgressCallback;
  private shouldStop = false;
  private wakeIdle: (() => void) | null = null;
  private readonly batchSize: number;
  private readonly entityTypes: readonly string[];
  private readonly log: Logger;

  constructor(
    private readonly fetcher: EntityFetcher,
    private readonly writer: RecordWriter,
    private readonly provisioner: SchemaProvisioner,
    options: PipelineOptions,
  ) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${options.batchSize}`);
    }
    this.batchSize = options.batchSize;
    this.entityTypes = options.entityTypes ?? KNOWN_ENTITY_TYPES;
    this.log = options.logger ?? rootLogger.child({ module: 'pipeline' });
  }

  public get state(): PipelineState {
    return this.currentState;
  }

  public onProgress(cb: ProgressCallback) {
    this.onProgressCallback = cb;
  }

  /** Ends the sweep after the current page, or leaves the idle loop. */
  public stop() {
    this.shouldStop = true;
    this.wakeIdle?.();
  }

  /**
   * One full sweep: connectivity check, table provisioning, then every entity
   * type in turn. Rejects when the broker is unreachable or provisioning
   * gives up; nothing is written in either case.
   */
  public async run(): Promise<PipelineSummary> {
    this.transition('connecting');
    if (!(await this.fetcher.testConnectivity())) {
      this.transition('failed');
      throw new BrokerUnavailableError(this.fetcher.baseUrl);
    }

    this.transition('provisioning');
    try {
      await this.provisioner.createTable();
    } catch (err) {
      this.transition('failed');
      throw err;
    }

    this.transition('ingesting');
    const types: TypeSummary[] = [];
    for (const type of this.entityTypes) {
      if (this.shouldStop) break;
      types.push(await this.processEntityType(type));
    }

    const totalWritten = types.reduce((sum, summary) => sum + summary.written, 0);
    this.log.info({ totalWritten, types: types.length }, 'Pipeline sweep complete');

    this.transition(this.shouldStop ? 'stopped' : 'idle');
    return { totalWritten, types };
  }

  /** Drains every page of one type; errors end this type only, keeping its partial count. */
  public async processEntityType(type: string): Promise<TypeSummary> {
    const summary: TypeSummary = { type, expected: 0, fetched: 0, parsed: 0, written: 0 };
    const tracker = new ProgressTracker(type);
    tracker.start();

    summary.expected = await this.fetcher.countByType(type);
    this.log.info({ type, expected: summary.expected, batchSize: this.batchSize }, 'Processing entity type');

    let batch = 0;
    try {
      for await (const page of this.fetcher.pages(type, this.batchSize)) {
        batch++;
        const { records } = parseEntities(page);
        const written = await this.writer.batchInsert(records);

        summary.fetched += page.length;
        summary.parsed += records.length;
        summary.written += written;
        tracker.record(written, page.length - written);

        this.log.info(
          { type, batch, fetched: page.length, parsed: records.length, written, runningTotal: summary.written },
          'Processed batch',
        );
        this.onProgressCallback?.(tracker.getSummary(summary.expected || undefined));

        if (this.shouldStop) {
          this.log.warn({ type, batch }, 'Stop requested, ending sweep');
          break;
        }
      }
    } catch (err) {
      this.log.error({ err, type, offset: batch * this.batchSize }, 'Error processing entity type');
    }

    this.log.info({ ...summary }, 'Completed entity type');
    return summary;
  }

  /** Keeps the process alive after a sweep, logging a heartbeat, until stop() is called. */
  public async idle(heartbeatMs: number): Promise<void> {
    if (this.currentState !== 'idle') return;
    this.log.info({ heartbeatMs }, 'Pipeline is idle');

    while (!this.shouldStop) {
      await this.waitForHeartbeat(heartbeatMs);
      if (!this.shouldStop) {
        this.log.info('Pipeline idle heartbeat');
      }
    }
    this.transition('stopped');
  }

  private waitForHeartbeat(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wakeIdle = null;
        resolve();
      }, ms);
      this.wakeIdle = () => {
        clearTimeout(timer);
        this.wakeIdle = null;
        resolve();
      };
    });
  }

  private transition(next: PipelineState) {
    this.log.debug({ from: this.currentState, to: next }, 'Pipeline state change');
    this.currentState = next;
  }
}
