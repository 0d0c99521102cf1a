import axios, { type AxiosInstance } from 'axios';
import { CONNECTIVITY_PROBE_TYPES } from '../ingestion/catalog.js';
import { isRawEntity, type RawEntity } from '../ingestion/entity.js';
import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface EntityFetcherOptions {
  logger?: Logger;
  probeTypes?: readonly string[];
}

// The broker answers a bare /entities query with 400 "Too broad query" when it is up.
const TOO_BROAD_QUERY = 'Too broad query';

const acceptAnyStatus = () => true;

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  return data === undefined ? '' : JSON.stringify(data);
}

export class EntityFetcher {
  private readonly endpoint = '/entities';
  private readonly log: Logger;
  private readonly probeTypes: readonly string[];

  constructor(
    private readonly client: AxiosInstance,
    options: EntityFetcherOptions = {},
  ) {
    this.log = options.logger ?? rootLogger.child({ module: 'fetcher' });
    this.probeTypes = options.probeTypes ?? CONNECTIVITY_PROBE_TYPES;
  }

  public get baseUrl(): string {
    return `${this.client.defaults.baseURL ?? ''}${this.endpoint}`;
  }

  /** One page of entities; an empty page on any failure, which also ends pagination. */
  public async fetchPage(type: string, limit: number, offset: number): Promise<RawEntity[]> {
    return (await this.requestPage(type, limit, offset)).entities;
  }

  /** Total from the X-Total-Count header; 0 when missing, malformed or on error. */
  public async countByType(type: string): Promise<number> {
    try {
      const response = await this.client.get(this.endpoint, {
        params: { type, count: true, limit: 1 },
      });
      const header: unknown = response.headers['x-total-count'];
      const count = Number.parseInt(String(header ?? '0'), 10);
      if (Number.isNaN(count)) {
        this.log.warn({ type, header }, 'Failed to parse entity count header');
        return 0;
      }
      return count;
    } catch (err) {
      this.log.warn({ type, reason: errorMessage(err) }, 'Failed to count entities');
      return 0;
    }
  }

  /**
   * Yields non-empty pages at offsets 0, batchSize, 2*batchSize, ... and stops
   * after the first page shorter than batchSize. When the total is an exact
   * multiple of batchSize this costs one extra, empty fetch.
   */
  public async *pages(type: string, batchSize: number): AsyncGenerator<RawEntity[], void, undefined> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }
    let offset = 0;
    while (true) {
      // Page size is judged on what the broker sent, before non-objects are dropped.
      const { entities, received } = await this.requestPage(type, batchSize, offset);
      if (received === 0) {
        return;
      }
      if (entities.length > 0) {
        yield entities;
      }
      if (received < batchSize) {
        return;
      }
      offset += batchSize;
    }
  }

  public async fetchAllByType(type: string, batchSize: number): Promise<RawEntity[]> {
    const all: RawEntity[] = [];
    for await (const page of this.pages(type, batchSize)) {
      all.push(...page);
    }
    this.log.info({ type, count: all.length }, 'Fetched all entities of type');
    return all;
  }

  /** True when any probe shows the broker is up and answering. */
  public async testConnectivity(): Promise<boolean> {
    this.log.info({ url: this.baseUrl }, 'Testing broker connectivity');

    const bare = await this.probe('bare', {});
    if (bare) {
      if (bare.status >= 200 && bare.status < 300) {
        this.log.info('Broker answered bare query');
        return true;
      }
      if (bare.status === 400 && bare.body.includes(TOO_BROAD_QUERY)) {
        this.log.info('Broker answered with the expected "Too broad query" response');
        return true;
      }
    }

    const local = await this.probe('local', { local: true, limit: 1 });
    if (local && local.status >= 200 && local.status < 300) {
      this.log.info('Broker answered local query');
      return true;
    }

    for (const type of this.probeTypes) {
      const typed = await this.probe(`type=${type}`, { type, limit: 1 });
      if (typed && typed.status >= 200 && typed.status < 300) {
        this.log.info({ type }, 'Broker answered typed query');
        return true;
      }
    }

    this.log.error({ url: this.baseUrl }, 'Broker connectivity test failed');
    return false;
  }

  private async requestPage(
    type: string,
    limit: number,
    offset: number,
  ): Promise<{ entities: RawEntity[]; received: number }> {
    const params = { type, limit, offset };
    try {
      const response = await this.client.get(this.endpoint, { params });
      const data: unknown = response.data;
      if (!Array.isArray(data)) {
        this.log.warn({ ...params }, 'Broker returned a non-array body, treating as empty page');
        return { entities: [], received: 0 };
      }
      const entities = data.filter(isRawEntity);
      if (entities.length !== data.length) {
        this.log.warn({ ...params, dropped: data.length - entities.length }, 'Dropped non-object items from page');
      }
      this.log.debug({ ...params, count: entities.length }, 'Fetched entities');
      return { entities, received: data.length };
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        this.log.warn(
          { ...params, status: err.response.status, body: bodyText(err.response.data) },
          'Failed to fetch entities',
        );
      } else {
        this.log.warn({ ...params, err }, 'Error fetching entities');
      }
      return { entities: [], received: 0 };
    }
  }

  private async probe(
    name: string,
    params: Record<string, string | number | boolean>,
  ): Promise<{ status: number; body: string } | null> {
    try {
      const response = await this.client.get(this.endpoint, { params, validateStatus: acceptAnyStatus });
      const result = { status: response.status, body: bodyText(response.data) };
      this.log.debug({ probe: name, status: result.status }, 'Connectivity probe answered');
      return result;
    } catch (err) {
      this.log.warn({ probe: name, reason: errorMessage(err) }, 'Connectivity probe failed');
      return null;
    }
  }
}
