import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { KNOWN_ENTITY_TYPES } from './ingestion/catalog.js';
import type { RetryPolicy } from './utils/retry.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Load .env from the repository root (three levels up from src/)
dotenv.config({ path: path.resolve(__dirname, '..', '..', '..', '.env') });

type Env = Record<string, string | undefined>;

function intEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function listEnv(env: Env, name: string, fallback: readonly string[]): readonly string[] {
  const raw = env[name];
  if (!raw) return fallback;
  const items = raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : fallback;
}

export function loadConfig(env: Env = process.env) {
  const batchSize = intEnv(env, 'BATCH_SIZE', 500);
  if (batchSize < 1) throw new Error(`BATCH_SIZE must be at least 1, got ${batchSize}`);

  const storeRpcPauseMs = intEnv(env, 'STORE_RPC_PAUSE_MS', 2000);
  const provisionRetry: RetryPolicy = {
    maxAttempts: intEnv(env, 'PROVISION_MAX_ATTEMPTS', 21),
    baseMs: intEnv(env, 'PROVISION_BASE_DELAY_MS', 10_000),
    factor: 2,
    maxMs: intEnv(env, 'PROVISION_MAX_DELAY_MS', 5 * 60_000),
  };

  return Object.freeze({
    logLevel: env.LOG_LEVEL ?? 'info',

    // Context broker
    broker: {
      host: env.BROKER_HOST ?? 'fiware-orion',
      port: intEnv(env, 'BROKER_PORT', 1026),
      basePath: env.BROKER_BASE_PATH ?? '/ngsi-ld/v1',
      timeoutMs: intEnv(env, 'BROKER_TIMEOUT_MS', 10000),
    },

    // Wide-column store (REST gateway)
    store: {
      restUrl: env.STORE_REST_URL ?? 'http://hbase:8080',
      timeoutMs: intEnv(env, 'STORE_TIMEOUT_MS', 30000),
      rpcRetry: {
        maxAttempts: intEnv(env, 'STORE_RPC_RETRIES', 5),
        baseMs: storeRpcPauseMs,
        factor: 1,
        maxMs: storeRpcPauseMs,
      } satisfies RetryPolicy,
    },

    tableName: env.TABLE_NAME ?? 'SensorData',
    provisionRetry,

    // Ingestion
    batchSize,
    entityTypes: listEnv(env, 'ENTITY_TYPES', KNOWN_ENTITY_TYPES),
    idleHeartbeatMs: intEnv(env, 'IDLE_HEARTBEAT_MS', 60_000),
  });
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();
