import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { AxiosInstance } from 'axios';
import { Pipeline } from '../../src/ingestion/pipeline.js';
import { EntityFetcher } from '../../src/api/fetcher.js';
import { SchemaProvisioner } from '../../src/store/provisioner.js';
import { RecordWriter } from '../../src/store/writer.js';
import { BrokerUnavailableError, ProvisioningError, StoreError } from '../../src/errors.js';
import { MemoryStore } from '../helpers/memoryStore.js';
import { captureLogs } from '../helpers/logCapture.js';
import { ok } from '../helpers/http.js';

type Params = Record<string, string | number | boolean | undefined>;
type GetConfig = { params: Params; validateStatus?: unknown };

const TABLE = 'SensorData';
const TYPES = ['TemperatureSensor', 'HumiditySensor'];

const temperature = [
  {
    id: 'urn:ngsi-ld:Sensor:kitchen_temperature_1',
    type: 'TemperatureSensor',
    temperature: { type: 'Property', value: 21.5 },
    dateObserved: { type: 'Property', value: '2024-01-01T00:00:00Z' },
  },
  // no id: parses to nothing
  { type: 'TemperatureSensor', temperature: { value: 19 } },
  {
    id: 'urn:ngsi-ld:Sensor:garage_temperature_3',
    type: 'TemperatureSensor',
    room: { type: 'Property', value: 'Garage' },
    temperature: { type: 'Property', value: 12 },
    dateObserved: { type: 'Property', value: '2024-01-01T00:10:00Z' },
  },
];

const humidity = [1, 2, 3, 4].map(n => ({
  id: `urn:ngsi-ld:Sensor:bathroom_humidity_${n}`,
  type: 'HumiditySensor',
  humidity: { type: 'Property', value: 40 + n },
  dateObserved: { type: 'Property', value: '2024-01-01T00:00:00Z' },
}));

/** Answers like a broker holding `data`, keyed by entity type. */
function brokerGet(data: Record<string, object[]>) {
  return vi.fn(async (_url: string, config: GetConfig) => {
    const { params } = config;
    if (config.validateStatus) {
      return { status: 400, data: { title: 'Too broad query' }, headers: {} };
    }
    const source = data[String(params.type)] ?? [];
    if (params.count) {
      return ok(source.slice(0, 1), { 'x-total-count': String(source.length) });
    }
    const offset = Number(params.offset);
    return ok(source.slice(offset, offset + Number(params.limit)));
  });
}

describe('Pipeline (broker mock -> in-memory store)', () => {
  let mockClient: any;
  let store: MemoryStore;
  let sleep: ReturnType<typeof vi.fn>;
  let logs: ReturnType<typeof captureLogs>;
  let fetcher: EntityFetcher;
  let provisioner: SchemaProvisioner;
  let writer: RecordWriter;
  let pipeline: Pipeline;

  const pageOffsets = (type: string): number[] =>
    mockClient.get.mock.calls
      .filter(([, config]: [string, GetConfig]) => config.params.type === type && !config.params.count && !config.validateStatus)
      .map(([, config]: [string, GetConfig]) => config.params.offset);

  beforeEach(() => {
    mockClient = {
      get: brokerGet({ TemperatureSensor: temperature, HumiditySensor: humidity }),
      defaults: { baseURL: 'http://broker:1026/ngsi-ld/v1' },
    };
    store = new MemoryStore();
    sleep = vi.fn().mockResolvedValue(undefined);
    logs = captureLogs();

    fetcher = new EntityFetcher(mockClient as unknown as AxiosInstance, { logger: logs.logger });
    provisioner = new SchemaProvisioner(store, { tableName: TABLE, logger: logs.logger, sleep });
    writer = new RecordWriter(store, TABLE, logs.logger);
    pipeline = new Pipeline(fetcher, writer, provisioner, {
      batchSize: 2,
      entityTypes: TYPES,
      logger: logs.logger,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.clearAllMocks();
  });

  it('sweeps every type into the store', async () => {
    const summary = await pipeline.run();

    expect(summary).toEqual({
      totalWritten: 6,
      types: [
        { type: 'TemperatureSensor', expected: 3, fetched: 3, parsed: 2, written: 2 },
        { type: 'HumiditySensor', expected: 4, fetched: 4, parsed: 4, written: 4 },
      ],
    });
    expect(pipeline.state).toBe('idle');
    expect(store.cellCount(TABLE)).toBe(6);

    // probe + (count + 2 pages) + (count + 3 pages)
    expect(mockClient.get).toHaveBeenCalledTimes(8);
    expect(pageOffsets('TemperatureSensor')).toEqual([0, 2]);
    expect(pageOffsets('HumiditySensor')).toEqual([0, 2, 4]);
  });

  it('stores readings as "value|timestamp" under room and sensor name', async () => {
    await pipeline.run();

    await expect(
      store.getCell(TABLE, 'urn:ngsi-ld:Sensor:kitchen_temperature_1', 'kitchen', 'temperature'),
    ).resolves.toBe('21.5|2024-01-01T00:00:00Z');
    await expect(
      store.getCell(TABLE, 'urn:ngsi-ld:Sensor:garage_temperature_3', 'room1', 'temperature'),
    ).resolves.toBe('12|2024-01-01T00:10:00Z');
    await expect(
      store.getCell(TABLE, 'urn:ngsi-ld:Sensor:bathroom_humidity_4', 'bathroom', 'humidity'),
    ).resolves.toBe('44|2024-01-01T00:00:00Z');
  });

  it('reports progress after every page', async () => {
    vi.useFakeTimers();
    const progress: string[] = [];
    pipeline.onProgress(summary => progress.push(summary));

    await pipeline.run();

    expect(progress).toEqual([
      '[TemperatureSensor] Written: 1 | Skipped: 1 | Throughput: 0 records/sec | ETA: 0s',
      '[TemperatureSensor] Written: 2 | Skipped: 1 | Throughput: 0 records/sec | ETA: 0s',
      '[HumiditySensor] Written: 2 | Skipped: 0 | Throughput: 0 records/sec | ETA: 0s',
      '[HumiditySensor] Written: 4 | Skipped: 0 | Throughput: 0 records/sec | ETA: 0s',
    ]);
  });

  it('fails without provisioning when the broker is unreachable', async () => {
    mockClient.get = vi.fn().mockResolvedValue({ status: 503, data: 'unavailable', headers: {} });

    let caught: unknown;
    await pipeline.run().catch(err => { caught = err; });

    expect(caught).toBeInstanceOf(BrokerUnavailableError);
    expect(caught).toMatchObject({ message: 'Context broker is not reachable at http://broker:1026/ngsi-ld/v1/entities' });
    expect(pipeline.state).toBe('failed');
    expect(store.createCalls).toBe(0);
    expect(store.tables.size).toBe(0);
  });

  it('fails without ingesting when provisioning gives up', async () => {
    const masterDown = () => new StoreError('org.apache.hadoop.hbase.PleaseHoldException: Master is initializing', 500);
    store.failNext('createTable', [masterDown(), masterDown()]);
    provisioner = new SchemaProvisioner(store, {
      tableName: TABLE,
      retryPolicy: { maxAttempts: 2, baseMs: 1, factor: 2, maxMs: 1 },
      logger: logs.logger,
      sleep,
    });
    pipeline = new Pipeline(fetcher, writer, provisioner, { batchSize: 2, entityTypes: TYPES, logger: logs.logger });

    await expect(pipeline.run()).rejects.toBeInstanceOf(ProvisioningError);
    expect(pipeline.state).toBe('failed');
    expect(mockClient.get).toHaveBeenCalledTimes(1);
    expect(store.putCalls).toBe(0);
  });

  it('ends the sweep after the current page when stopped', async () => {
    pipeline.onProgress(() => pipeline.stop());

    const summary = await pipeline.run();

    expect(summary).toEqual({
      totalWritten: 1,
      types: [{ type: 'TemperatureSensor', expected: 3, fetched: 2, parsed: 1, written: 1 }],
    });
    expect(pipeline.state).toBe('stopped');
    expect(pageOffsets('HumiditySensor')).toEqual([]);
  });

  it('keeps going with the next type when one type fails', async () => {
    const batchInsert = vi
      .fn()
      .mockRejectedValueOnce(new Error('writer crashed'))
      .mockImplementation(async (records: unknown[]) => records.length);
    const stubWriter = { batchInsert } as unknown as RecordWriter;
    pipeline = new Pipeline(fetcher, stubWriter, provisioner, { batchSize: 2, entityTypes: TYPES, logger: logs.logger });

    const summary = await pipeline.run();

    expect(summary.types).toEqual([
      { type: 'TemperatureSensor', expected: 3, fetched: 0, parsed: 0, written: 0 },
      { type: 'HumiditySensor', expected: 4, fetched: 4, parsed: 4, written: 4 },
    ]);
    expect(logs.messages('error')).toEqual(['Error processing entity type']);
    expect(pipeline.state).toBe('idle');
  });

  it('logs a heartbeat while idle until stopped', async () => {
    await pipeline.run();
    vi.useFakeTimers();

    const idle = pipeline.idle(60000);
    await vi.advanceTimersByTimeAsync(120000);

    expect(logs.messages('info').filter(msg => msg === 'Pipeline idle heartbeat')).toHaveLength(2);

    pipeline.stop();
    await idle;
    expect(pipeline.state).toBe('stopped');
  });

  it('does not idle before a sweep has completed', async () => {
    await pipeline.idle(60000);
    expect(pipeline.state).toBe('init');
  });

  it('rejects a batch size below 1', () => {
    expect(() => new Pipeline(fetcher, writer, provisioner, { batchSize: 0 })).toThrow(RangeError);
  });
});
