import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config.js';
import { KNOWN_ENTITY_TYPES } from '../../src/ingestion/catalog.js';

describe('loadConfig()', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.logLevel).toBe('info');
    expect(config.broker).toEqual({
      host: 'fiware-orion',
      port: 1026,
      basePath: '/ngsi-ld/v1',
      timeoutMs: 10000,
    });
    expect(config.store).toEqual({
      restUrl: 'http://hbase:8080',
      timeoutMs: 30000,
      rpcRetry: { maxAttempts: 5, baseMs: 2000, factor: 1, maxMs: 2000 },
    });
    expect(config.tableName).toBe('SensorData');
    expect(config.provisionRetry).toEqual({ maxAttempts: 21, baseMs: 10000, factor: 2, maxMs: 300000 });
    expect(config.batchSize).toBe(500);
    expect(config.entityTypes).toEqual(KNOWN_ENTITY_TYPES);
    expect(config.idleHeartbeatMs).toBe(60000);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      BROKER_HOST: 'localhost',
      BROKER_PORT: '9090',
      STORE_REST_URL: 'http://localhost:8085',
      STORE_RPC_RETRIES: '2',
      STORE_RPC_PAUSE_MS: '250',
      TABLE_NAME: 'Readings',
      BATCH_SIZE: '100',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.broker.host).toBe('localhost');
    expect(config.broker.port).toBe(9090);
    expect(config.store.restUrl).toBe('http://localhost:8085');
    expect(config.store.rpcRetry).toEqual({ maxAttempts: 2, baseMs: 250, factor: 1, maxMs: 250 });
    expect(config.tableName).toBe('Readings');
    expect(config.batchSize).toBe(100);
  });

  it('splits ENTITY_TYPES on commas and drops blanks', () => {
    const config = loadConfig({ ENTITY_TYPES: ' TemperatureSensor, ,HumiditySensor,' });
    expect(config.entityTypes).toEqual(['TemperatureSensor', 'HumiditySensor']);
  });

  it('ignores a non-numeric integer setting', () => {
    expect(loadConfig({ BROKER_PORT: 'abc' }).broker.port).toBe(1026);
  });

  it('rejects a batch size below 1', () => {
    expect(() => loadConfig({ BATCH_SIZE: '0' })).toThrow('BATCH_SIZE must be at least 1, got 0');
  });
});
