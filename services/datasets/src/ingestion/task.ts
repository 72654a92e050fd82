import { promises as fs } from 'node:fs';
import path from 'node:path';
import { TaskTimeoutError, describeError } from '../errors';
import type { ServiceLogger } from '../logger';
import type { VersionKey, VersionRegistry, VersionStatus } from '../registry/types';
import { removeDirectory } from '../staging/chunkStore';
import { buildTableName, type MaterializedTableInfo, type TableMaterializer } from '../tables/materializer';
import { assembleChunks } from './assembler';
import type { IngestionJobPayload, IngestionOutcome, RetryPolicy } from './types';

export interface IngestionTaskDependencies {
  materializer: TableMaterializer;
  registry: VersionRegistry;
  logger: ServiceLogger;
  policy: RetryPolicy;
  assemble?: typeof assembleChunks;
}

function versionKeyOf(payload: IngestionJobPayload): VersionKey {
  return { datasetId: payload.datasetId, versionId: payload.versionId, userId: payload.userId };
}

function errorNameOf(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}

async function pathIsFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}

async function performAttempt(
  payload: IngestionJobPayload,
  deps: IngestionTaskDependencies,
  signal: AbortSignal
): Promise<MaterializedTableInfo> {
  const assemble = deps.assemble ?? assembleChunks;

  await fs.mkdir(path.dirname(payload.destinationPath), { recursive: true });
  await assemble(payload.stagingDir, payload.totalChunks, payload.destinationPath, { signal });

  signal.throwIfAborted();
  const table = await deps.materializer.materialize(
    payload.userId,
    payload.datasetId,
    payload.versionId,
    payload.destinationPath,
    { signal }
  );

  signal.throwIfAborted();
  await removeDirectory(payload.stagingDir);

  const [fileReady, namespaceReady] = await Promise.all([
    pathIsFile(payload.destinationPath),
    deps.materializer.namespaceExists(payload.userId)
  ]);
  if (!fileReady || !namespaceReady) {
    throw new Error(
      `Post-ingestion check failed (file: ${fileReady ? 'ok' : 'missing'}, database: ${namespaceReady ? 'ok' : 'missing'})`
    );
  }
  return table;
}

async function cleanupAfterFailure(payload: IngestionJobPayload, deps: IngestionTaskDependencies): Promise<void> {
  const { logger } = deps;
  const tableName = buildTableName(payload.datasetId, payload.versionId);
  try {
    await deps.materializer.dropTable(payload.userId, tableName);
  } catch (err) {
    logger.warn({ err, userId: payload.userId, tableName }, '[tabletalk:ingest] failed to drop table of failed attempt');
  }
  try {
    await removeDirectory(payload.stagingDir);
  } catch (err) {
    logger.warn({ err, stagingDir: payload.stagingDir }, '[tabletalk:ingest] failed to remove staging directory');
  }
  try {
    await fs.rm(payload.destinationPath, { force: true });
  } catch (err) {
    logger.warn(
      { err, destinationPath: payload.destinationPath },
      '[tabletalk:ingest] failed to remove partial destination file'
    );
  }
}

export async function recordStatus(
  payload: IngestionJobPayload,
  deps: IngestionTaskDependencies,
  status: VersionStatus
): Promise<void> {
  try {
    const updated = await deps.registry.markStatus(versionKeyOf(payload), status);
    if (!updated) {
      deps.logger.warn(
        { datasetId: payload.datasetId, versionId: payload.versionId, userId: payload.userId },
        '[tabletalk:ingest] version record missing while updating status'
      );
    }
  } catch (err) {
    deps.logger.error(
      { err, datasetId: payload.datasetId, versionId: payload.versionId, status },
      '[tabletalk:ingest] failed to update version status'
    );
  }
}

/**
 * Runs a single ingestion attempt (assemble, materialize, clean up) and
 * reports what should happen next. Never throws for ingestion failures.
 */
export async function runIngestionAttempt(
  payload: IngestionJobPayload,
  deps: IngestionTaskDependencies
): Promise<IngestionOutcome> {
  const { logger, policy } = deps;
  const startedAt = Date.now();
  const context = {
    userId: payload.userId,
    datasetId: payload.datasetId,
    versionId: payload.versionId,
    attempt: payload.attempt
  };

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const timeoutError = new TaskTimeoutError(policy.timeoutMs);
      controller.abort(timeoutError);
      reject(timeoutError);
    }, policy.timeoutMs);
  });

  logger.info(context, '[tabletalk:ingest] ingestion attempt started');
  const running = performAttempt(payload, deps, controller.signal);

  try {
    const table = await Promise.race([running, deadline]);
    const durationMs = Date.now() - startedAt;
    logger.info(
      { ...context, tableName: table.tableName, rowCount: table.rowCount, durationMs },
      '[tabletalk:ingest] ingestion succeeded'
    );
    await recordStatus(payload, deps, 'ready');
    return { status: 'succeeded', attempt: payload.attempt, table, durationMs };
  } catch (error) {
    const fatal = error instanceof TaskTimeoutError || controller.signal.aborted;
    const reason = describeError(error);
    const errorName = errorNameOf(error);
    if (fatal) {
      // the aborted attempt may still hold the namespace lock or be writing files
      await running.then(
        () => undefined,
        (err: unknown) => {
          logger.debug({ ...context, err }, '[tabletalk:ingest] timed-out attempt unwound');
        }
      );
    }
    await cleanupAfterFailure(payload, deps);

    if (fatal || payload.attempt > policy.maxRetries) {
      logger.error(
        { ...context, err: error, maxRetries: policy.maxRetries },
        fatal
          ? '[tabletalk:ingest] ingestion timed out; not retrying'
          : '[tabletalk:ingest] ingestion failed permanently'
      );
      await recordStatus(payload, deps, 'failed');
      return { status: 'failed_permanently', attempt: payload.attempt, reason, errorName };
    }

    logger.warn(
      { ...context, err: error, retryInMs: policy.retryDelayMs },
      '[tabletalk:ingest] ingestion attempt failed; retry scheduled'
    );
    return { status: 'retrying', attempt: payload.attempt, delayMs: policy.retryDelayMs, reason, errorName };
  } finally {
    clearTimeout(timer);
  }
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Drives attempts in-process until the task succeeds or fails permanently,
 * waiting the returned delay between attempts.
 */
export async function runIngestionTask(
  payload: IngestionJobPayload,
  deps: IngestionTaskDependencies,
  options: { sleep?: Sleep; onOutcome?: (outcome: IngestionOutcome) => void } = {}
): Promise<IngestionOutcome> {
  const sleep = options.sleep ?? defaultSleep;
  let current = payload;
  for (;;) {
    const outcome = await runIngestionAttempt(current, deps);
    options.onOutcome?.(outcome);
    if (outcome.status !== 'retrying') {
      return outcome;
    }
    await sleep(outcome.delayMs);
    current = { ...current, attempt: current.attempt + 1 };
  }
}
