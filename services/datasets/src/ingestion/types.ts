import { z } from 'zod';
import type { MaterializedTableInfo } from '../tables/materializer';

export const ingestionJobPayloadSchema = z.object({
  userId: z.string().min(1),
  datasetId: z.string().min(1),
  versionId: z.string().min(1),
  stagingDir: z.string().min(1),
  destinationPath: z.string().min(1),
  totalChunks: z.number().int().positive(),
  attempt: z.number().int().positive().default(1),
  submittedAt: z.string()
});

export type IngestionJobPayload = z.infer<typeof ingestionJobPayloadSchema>;

export type IngestionJobInput = Omit<z.input<typeof ingestionJobPayloadSchema>, 'submittedAt'> & { submittedAt?: string };

export interface RetryPolicy {
  /** Retries allowed after the first attempt. */
  maxRetries: number;
  retryDelayMs: number;
  /** Wall-clock ceiling for a single attempt. */
  timeoutMs: number;
}

export type IngestionOutcome =
  | {
      status: 'succeeded';
      attempt: number;
      table: MaterializedTableInfo;
      durationMs: number;
    }
  | {
      status: 'retrying';
      attempt: number;
      delayMs: number;
      reason: string;
      errorName: string;
    }
  | {
      status: 'failed_permanently';
      attempt: number;
      reason: string;
      errorName: string;
    };
