import { Worker } from 'bullmq';

import { isInlineQueueMode, loadServiceConfig } from '../config/serviceConfig';
import { createIngestionProcessor } from '../ingestion/processor';
import type { IngestionJobPayload, IngestionOutcome } from '../ingestion/types';
import { createProcessLogger } from '../logger';
import { QueuedIngestionDispatcher } from '../queue';
import { createVersionRegistry } from '../registry';
import { DuckDbTableStore } from '../tables/materializer';

const config = loadServiceConfig();
const logger = createProcessLogger(config.logLevel);

async function main(): Promise<void> {
  if (isInlineQueueMode(config)) {
    logger.info('[tabletalk:ingest] inline queue mode active; worker not started.');
    return;
  }

  const registry = await createVersionRegistry(config, logger);
  const dispatcher = new QueuedIngestionDispatcher(config.redisUrl, config.ingestion.queueName, logger);
  const processIngestionJob = createIngestionProcessor(
    {
      materializer: new DuckDbTableStore(config.storage.duckdbRoot),
      registry,
      logger,
      policy: {
        maxRetries: config.ingestion.maxRetries,
        retryDelayMs: config.ingestion.retryDelayMs,
        timeoutMs: config.ingestion.timeoutMs
      }
    },
    (payload, delayMs) => dispatcher.scheduleRetry(payload, delayMs)
  );

  const worker = new Worker<IngestionJobPayload, IngestionOutcome>(
    config.ingestion.queueName,
    async (job) => processIngestionJob(job.data),
    {
      connection: dispatcher.getConnection(),
      concurrency: config.ingestion.concurrency
    }
  );

  worker.on('completed', (job, outcome) => {
    logger.info(
      {
        jobId: job.id,
        datasetId: job.data.datasetId,
        versionId: job.data.versionId,
        status: outcome.status,
        attempt: outcome.attempt
      },
      '[tabletalk:ingest] ingestion job completed'
    );
  });

  worker.on('failed', (job, err) => {
    logger.error(
      {
        jobId: job?.id,
        datasetId: job?.data.datasetId ?? null,
        err
      },
      '[tabletalk:ingest] job failed'
    );
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, '[tabletalk:ingest] shutting down');
    await worker.close();
    await dispatcher.close();
    await registry.close();
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  logger.info(
    { queueName: config.ingestion.queueName, concurrency: config.ingestion.concurrency },
    '[tabletalk:ingest] worker started'
  );
}

main().catch((err) => {
  logger.error({ err }, '[tabletalk:ingest] fatal error');
  process.exit(1);
});
