import multipart from '@fastify/multipart';
import fastify, { type FastifyInstance } from 'fastify';

import type { ServiceConfig } from './config/serviceConfig';
import { mapErrorToResponse } from './errors';
import type { IngestionTaskDependencies, Sleep } from './ingestion/task';
import { createLogger } from './logger';
import { createIngestionDispatcher, type IngestionDispatcher } from './queue';
import { QueryService } from './query/queryService';
import { FallbackResultSummarizer, OpenAiResultSummarizer, type ResultSummarizer } from './query/summarizer';
import { OpenAiSqlGenerator, UnconfiguredSqlGenerator, type SqlGenerator } from './query/textToSql';
import { createVersionRegistry, type VersionRegistry } from './registry';
import { registerHealthRoutes } from './routes/health';
import { registerQueryRoutes } from './routes/query';
import { registerUploadRoutes } from './routes/uploads';
import { registerVersionRoutes } from './routes/versions';
import { initializeStaleUploadReaper, shutdownStaleUploadReaper } from './service/staleUploadReaper';
import { ChunkStore } from './staging/chunkStore';
import { DuckDbTableStore } from './tables/materializer';
import type { AppContext } from './types';

export interface AppOverrides {
  registry?: VersionRegistry;
  tables?: DuckDbTableStore;
  generator?: SqlGenerator;
  summarizer?: ResultSummarizer;
  dispatcher?: IngestionDispatcher;
  /** Wait between inline retries. */
  sleep?: Sleep;
}

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export const createApp = async (config: ServiceConfig, overrides: AppOverrides = {}): Promise<CreateAppResult> => {
  const logger = createLogger(config.logLevel);
  const app = fastify({ logger });
  await app.register(multipart, {
    limits: {
      files: 1,
      fileSize: config.storage.maxChunkBytes
    }
  });

  const registry = overrides.registry ?? (await createVersionRegistry(config, app.log));
  const tables = overrides.tables ?? new DuckDbTableStore(config.storage.duckdbRoot);
  const chunks = new ChunkStore(config.storage.stagingRoot);

  const taskDeps: IngestionTaskDependencies = {
    materializer: tables,
    registry,
    logger: app.log,
    policy: {
      maxRetries: config.ingestion.maxRetries,
      retryDelayMs: config.ingestion.retryDelayMs,
      timeoutMs: config.ingestion.timeoutMs
    }
  };
  const dispatcher = overrides.dispatcher ?? createIngestionDispatcher(config, taskDeps, { sleep: overrides.sleep });

  const llmOptions = config.llm.apiKey
    ? {
        apiKey: config.llm.apiKey,
        baseUrl: config.llm.baseUrl,
        model: config.llm.model,
        timeoutMs: config.llm.timeoutMs
      }
    : null;
  const generator =
    overrides.generator ?? (llmOptions ? new OpenAiSqlGenerator(llmOptions) : new UnconfiguredSqlGenerator());
  const summarizer =
    overrides.summarizer ??
    (llmOptions ? new OpenAiResultSummarizer(llmOptions, app.log) : new FallbackResultSummarizer());

  const queries = new QueryService({
    registry,
    tables,
    generator,
    summarizer,
    logger: app.log,
    previewRows: config.query.previewRows,
    sampleRows: config.query.sampleRows
  });

  const ctx: AppContext = {
    config,
    chunks,
    registry,
    tables,
    dispatcher,
    queries
  };

  registerHealthRoutes(app, ctx);
  registerUploadRoutes(app, ctx);
  registerVersionRoutes(app, ctx);
  registerQueryRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
  });

  if (config.reaper.enabled) {
    await initializeStaleUploadReaper({ config, logger: app.log });
  }

  app.addHook('onClose', async () => {
    if (config.reaper.enabled) {
      await shutdownStaleUploadReaper();
    }
    await dispatcher.close();
    await registry.close();
  });

  return { app, ctx };
};
