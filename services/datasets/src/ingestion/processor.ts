import { describeError } from '../errors';
import { recordStatus, runIngestionAttempt, type IngestionTaskDependencies } from './task';
import { ingestionJobPayloadSchema, type IngestionJobPayload, type IngestionOutcome } from './types';

export type RetryScheduler = (payload: IngestionJobPayload, delayMs: number) => Promise<void>;

/**
 * Queue-side handler: runs exactly one attempt per job and, when the
 * outcome asks for it, schedules the next attempt as a delayed job. A retry
 * that cannot be scheduled fails the version.
 */
export function createIngestionProcessor(
  deps: IngestionTaskDependencies,
  scheduleRetry: RetryScheduler
): (data: unknown) => Promise<IngestionOutcome> {
  return async (data) => {
    const payload = ingestionJobPayloadSchema.parse(data);
    const outcome = await runIngestionAttempt(payload, deps);
    if (outcome.status !== 'retrying') {
      return outcome;
    }

    const next = { ...payload, attempt: payload.attempt + 1 };
    const context = {
      datasetId: payload.datasetId,
      versionId: payload.versionId,
      userId: payload.userId,
      nextAttempt: next.attempt
    };
    try {
      await scheduleRetry(next, outcome.delayMs);
    } catch (err) {
      deps.logger.error({ ...context, err }, '[tabletalk:ingest] failed to enqueue retry; marking version failed');
      await recordStatus(payload, deps, 'failed');
      return {
        status: 'failed_permanently',
        attempt: payload.attempt,
        reason: describeError(err),
        errorName: err instanceof Error ? err.name : 'Error'
      };
    }
    deps.logger.info({ ...context, delayMs: outcome.delayMs }, '[tabletalk:ingest] retry enqueued');
    return outcome;
  };
}
