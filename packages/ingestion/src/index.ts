export { createBrokerClient, brokerBaseUrl, type BrokerClientConfig } from './api/client.js';
export { EntityFetcher, type EntityFetcherOptions } from './api/fetcher.js';
export {
  ROOMS,
  DEFAULT_ROOM,
  KNOWN_ENTITY_TYPES,
  SENSOR_NAMES_BY_TYPE,
  isRoom,
  toRoom,
  sensorNameForType,
  type Room,
} from './ingestion/catalog.js';
export type { RawEntity, SensorRecord } from './ingestion/entity.js';
export { parseEntity, parseEntities, type ParseOutcome, type ParseOptions } from './ingestion/parser.js';
export {
  Pipeline,
  type PipelineOptions,
  type PipelineState,
  type PipelineSummary,
  type TypeSummary,
} from './ingestion/pipeline.js';
export { createStoreClient, type StoreClientConfig } from './store/client.js';
export { HBaseRestStore, DEFAULT_RPC_RETRY, type HBaseRestStoreOptions } from './store/hbase.js';
export { SchemaProvisioner, DEFAULT_PROVISION_RETRY, type SchemaProvisionerOptions } from './store/provisioner.js';
export { RecordWriter, toCell, encodeCellValue, type WritableRecord } from './store/writer.js';
export type { Cell, TableDescriptor, WideColumnStore } from './store/types.js';
export { withRetry, computeExponentialBackoff, type RetryPolicy, type RetryOptions } from './utils/retry.js';
export { createLogger, logger, type Logger } from './utils/logger.js';
export { createShutdownHandler, type ShutdownOptions } from './utils/shutdown.js';
export * from './errors.js';
