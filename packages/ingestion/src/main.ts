import { config } from './config.js';
import { logger } from './utils/logger.js';
import { createBrokerClient } from './api/client.js';
import { EntityFetcher } from './api/fetcher.js';
import { createStoreClient } from './store/client.js';
import { HBaseRestStore } from './store/hbase.js';
import { SchemaProvisioner } from './store/provisioner.js';
import { RecordWriter } from './store/writer.js';
import { Pipeline } from './ingestion/pipeline.js';
import { ROOMS } from './ingestion/catalog.js';
import { createShutdownHandler } from './utils/shutdown.js';

async function main() {
  logger.level = config.logLevel;
  logger.info('Starting room sensor ingestion pipeline...');

  // 1. Init dependencies
  const fetcher = new EntityFetcher(createBrokerClient(config.broker));

  const store = new HBaseRestStore(createStoreClient(config.store), {
    rpcRetry: config.store.rpcRetry,
  });

  const provisioner = new SchemaProvisioner(store, {
    tableName: config.tableName,
    columnFamilies: ROOMS,
    retryPolicy: config.provisionRetry,
  });

  const writer = new RecordWriter(store, config.tableName);

  const pipeline = new Pipeline(fetcher, writer, provisioner, {
    batchSize: config.batchSize,
    entityTypes: config.entityTypes,
  });

  // 2. Graceful shutdown: ends the sweep after the current page, or leaves idle.
  // A second signal exits immediately.
  const shutdown = createShutdownHandler(() => pipeline.stop());

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  pipeline.onProgress((summary) => {
    logger.info(summary);
  });

  // 3. Connect, provision, sweep every entity type, then stay alive
  try {
    const summary = await pipeline.run();
    logger.info({ totalWritten: summary.totalWritten }, 'Pipeline sweep finished');
    await pipeline.idle(config.idleHeartbeatMs);
  } catch (error) {
    logger.fatal({ err: error }, 'Pipeline run aborted');
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

main().catch(err => {
  logger.fatal({ err }, 'Fatal unexpected error in main process');
  process.exit(1);
});
