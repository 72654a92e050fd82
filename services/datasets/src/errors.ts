import { ZodError } from 'zod';

export class ChunkWriteError extends Error {
  readonly chunkIndex: number;

  constructor(chunkIndex: number, cause: unknown) {
    super(`Failed to save chunk ${chunkIndex}: ${describeError(cause)}`);
    this.name = 'ChunkWriteError';
    this.chunkIndex = chunkIndex;
  }
}

export class MissingChunkError extends Error {
  readonly chunkIndex: number;

  constructor(chunkIndex: number) {
    super(`Missing chunk ${chunkIndex}`);
    this.name = 'MissingChunkError';
    this.chunkIndex = chunkIndex;
  }
}

export class SchemaInferenceError extends Error {
  readonly tableName: string;

  constructor(tableName: string, cause: unknown) {
    super(`Failed to create table ${tableName} from CSV: ${describeError(cause)}`);
    this.name = 'SchemaInferenceError';
    this.tableName = tableName;
  }
}

export class RegistrationConflictError extends Error {
  constructor(datasetId: string, versionId: string, userId: string) {
    super(`Dataset version ${datasetId}@${versionId} is already registered for user ${userId}`);
    this.name = 'RegistrationConflictError';
  }
}

export class TaskTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Ingestion attempt exceeded ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class VersionNotFoundError extends Error {
  constructor(datasetId: string, versionId?: string) {
    super(versionId ? `Dataset version ${datasetId}@${versionId} not found` : 'Dataset not found');
    this.name = 'VersionNotFoundError';
  }
}

export class TableNotFoundError extends Error {
  constructor(tableName: string) {
    super(`Table ${tableName} not found in user's database`);
    this.name = 'TableNotFoundError';
  }
}

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export class SqlGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SqlGenerationError';
  }
}

export class QueryExecutionError extends Error {
  constructor(cause: unknown) {
    super(`Error executing query: ${describeError(cause)}`);
    this.name = 'QueryExecutionError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ErrorResponse {
  statusCode: number;
  message: string;
  details?: unknown;
}

function clientStatusCode(error: unknown): number | null {
  if (!error || typeof error !== 'object' || !('statusCode' in error)) {
    return null;
  }
  const { statusCode } = error;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500 ? statusCode : null;
}

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof VersionNotFoundError || error instanceof TableNotFoundError) {
    return { statusCode: 404, message: error.message };
  }

  if (error instanceof RegistrationConflictError) {
    return { statusCode: 409, message: error.message };
  }

  if (error instanceof RequestValidationError) {
    return { statusCode: 400, message: error.message };
  }

  if (error instanceof SqlGenerationError) {
    return { statusCode: 400, message: `Failed to generate SQL query: ${error.message}` };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  if (error instanceof ChunkWriteError || error instanceof QueryExecutionError) {
    return { statusCode: 500, message: error.message };
  }

  const statusCode = clientStatusCode(error);
  if (statusCode !== null) {
    return { statusCode, message: describeError(error) };
  }

  return {
    statusCode: 500,
    message: 'Unexpected error'
  };
};
