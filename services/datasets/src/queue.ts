import { Queue, type Job, type JobsOptions } from 'bullmq';
import IORedis, { type Redis } from 'ioredis';
import { isInlineQueueMode, type ServiceConfig } from './config/serviceConfig';
import { describeError } from './errors';
import { runIngestionTask, type IngestionTaskDependencies, type Sleep } from './ingestion/task';
import {
  ingestionJobPayloadSchema,
  type IngestionJobInput,
  type IngestionJobPayload,
  type IngestionOutcome
} from './ingestion/types';
import type { ServiceLogger } from './logger';

export type QueueMode = 'inline' | 'queued';

export interface SubmittedIngestion {
  taskId: string;
  mode: QueueMode;
}

export interface IngestionDispatcher {
  readonly mode: QueueMode;
  submit(input: IngestionJobInput): Promise<SubmittedIngestion>;
  close(): Promise<void>;
}

const MAX_REMEMBERED_OUTCOMES = 500;

export function ingestionJobId(payload: IngestionJobPayload): string {
  return ['ingest', payload.userId, payload.datasetId, payload.versionId, `attempt${payload.attempt}`].join('__');
}

function parsePayload(input: IngestionJobInput): IngestionJobPayload {
  return ingestionJobPayloadSchema.parse({
    ...input,
    submittedAt: input.submittedAt ?? new Date().toISOString()
  });
}

/**
 * Runs ingestion tasks inside the current process. `submit` returns as soon
 * as the task is started; `waitFor` and `drain` expose completion.
 */
export class InlineIngestionDispatcher implements IngestionDispatcher {
  readonly mode = 'inline' as const;
  private readonly running = new Map<string, Promise<IngestionOutcome>>();
  private readonly outcomes = new Map<string, IngestionOutcome>();

  constructor(
    private readonly deps: IngestionTaskDependencies,
    private readonly sleep?: Sleep
  ) {}

  async submit(input: IngestionJobInput): Promise<SubmittedIngestion> {
    const payload = parsePayload(input);
    const taskId = `inline:${ingestionJobId(payload)}`;
    const tracked = runIngestionTask(payload, this.deps, { sleep: this.sleep }).then(
      (outcome) => this.settle(taskId, outcome),
      (error: unknown) => {
        this.deps.logger.error({ err: error, taskId }, '[tabletalk:ingest] inline ingestion crashed');
        return this.settle(taskId, {
          status: 'failed_permanently',
          attempt: payload.attempt,
          reason: describeError(error),
          errorName: error instanceof Error ? error.name : 'Error'
        });
      }
    );
    this.running.set(taskId, tracked);
    return { taskId, mode: this.mode };
  }

  async waitFor(taskId: string): Promise<IngestionOutcome | null> {
    const pending = this.running.get(taskId);
    if (pending) {
      return pending;
    }
    return this.outcomes.get(taskId) ?? null;
  }

  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running.values());
    }
  }

  async close(): Promise<void> {
    await this.drain();
  }

  private settle(taskId: string, outcome: IngestionOutcome): IngestionOutcome {
    this.running.delete(taskId);
    this.outcomes.set(taskId, outcome);
    if (this.outcomes.size > MAX_REMEMBERED_OUTCOMES) {
      const oldest = this.outcomes.keys().next();
      if (!oldest.done) {
        this.outcomes.delete(oldest.value);
      }
    }
    return outcome;
  }
}

function isJobExistsError(error: unknown, jobId: string): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.message.includes('already exists') && error.message.includes(jobId);
}

function isRedisConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const message = error.message;
  return message.includes('Connection is closed') || message.includes('Connection was never established');
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * BullMQ-backed dispatcher shared by the HTTP service (submit) and the
 * worker (retry scheduling).
 */
export class QueuedIngestionDispatcher implements IngestionDispatcher {
  readonly mode = 'queued' as const;
  private queueInstance: Queue<IngestionJobPayload> | null = null;
  private connection: Redis | null = null;

  constructor(
    private readonly redisUrl: string,
    readonly queueName: string,
    private readonly logger: ServiceLogger
  ) {}

  async submit(input: IngestionJobInput): Promise<SubmittedIngestion> {
    const payload = parsePayload(input);
    const job = await this.addJobWithRetries(payload, { jobId: ingestionJobId(payload) });
    return { taskId: String(job.id), mode: this.mode };
  }

  async scheduleRetry(payload: IngestionJobPayload, delayMs: number): Promise<void> {
    const jobId = ingestionJobId(payload);
    try {
      await this.addJobWithRetries(payload, { jobId, delay: delayMs });
    } catch (error) {
      if (isJobExistsError(error, jobId)) {
        return;
      }
      throw error;
    }
  }

  getConnection(): Redis {
    this.ensureQueue();
    if (!this.connection) {
      throw new Error('Redis connection not initialised');
    }
    return this.connection;
  }

  async close(): Promise<void> {
    if (this.queueInstance) {
      await this.queueInstance.close();
      this.queueInstance = null;
    }
    if (this.connection) {
      await this.connection.quit();
      this.connection = null;
    }
  }

  private ensureQueue(): Queue<IngestionJobPayload> {
    if (this.queueInstance) {
      return this.queueInstance;
    }
    if (!this.connection) {
      const connection = new IORedis(this.redisUrl, { maxRetriesPerRequest: null });
      connection.on('error', (err) => {
        this.logger.error({ err }, '[tabletalk:queue] Redis connection error');
      });
      this.connection = connection;
    }
    this.queueInstance = new Queue<IngestionJobPayload>(this.queueName, {
      connection: this.connection,
      defaultJobOptions: {
        removeOnComplete: 1000,
        removeOnFail: 1000
      }
    });
    return this.queueInstance;
  }

  private async resetQueueInstance(): Promise<void> {
    if (this.queueInstance) {
      try {
        await this.queueInstance.close();
      } catch (err) {
        this.logger.debug({ err }, '[tabletalk:queue] ignoring error while closing queue');
      }
      this.queueInstance = null;
    }
    if (this.connection) {
      try {
        await this.connection.quit();
      } catch {
        this.connection.disconnect();
      }
      this.connection = null;
    }
  }

  private async addJobWithRetries(
    payload: IngestionJobPayload,
    options: JobsOptions,
    attempts = 3,
    baseDelayMs = 200
  ): Promise<Job<IngestionJobPayload>> {
    let lastError: unknown;
    for (let attempt = 0; attempt < attempts; attempt += 1) {
      try {
        const queue = this.ensureQueue();
        await queue.waitUntilReady();
        return await queue.add(payload.datasetId, payload, options);
      } catch (error) {
        if (!isRedisConnectionError(error)) {
          throw error;
        }
        lastError = error;
        await this.resetQueueInstance();
        if (attempt < attempts - 1) {
          await delay(baseDelayMs * Math.pow(2, attempt));
        }
      }
    }
    throw lastError instanceof Error ? lastError : new Error(String(lastError ?? 'Failed to enqueue job'));
  }
}

export function createIngestionDispatcher(
  config: ServiceConfig,
  deps: IngestionTaskDependencies,
  options: { sleep?: Sleep } = {}
): IngestionDispatcher {
  if (isInlineQueueMode(config)) {
    return new InlineIngestionDispatcher(deps, options.sleep);
  }
  return new QueuedIngestionDispatcher(config.redisUrl, config.ingestion.queueName, deps.logger);
}
