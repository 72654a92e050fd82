export type VersionStatus = 'pending' | 'ready' | 'failed';

export interface DatasetVersion {
  datasetId: string;
  versionId: string;
  userId: string;
  filePath: string;
  status: VersionStatus;
  createdAt: string;
  updatedAt: string;
}

export interface RegisterVersionInput {
  datasetId: string;
  versionId: string;
  userId: string;
  filePath: string;
}

export interface VersionKey {
  datasetId: string;
  versionId: string;
  userId: string;
}

export interface LatestVersionOptions {
  /** Only consider versions whose ingestion succeeded. */
  readyOnly?: boolean;
}

export interface QueryLogEntry {
  datasetId: string;
  versionId: string;
  userId: string;
  question: string;
  generatedSql: string;
  rowCount: number;
  createdAt: string;
}

export type NewQueryLogEntry = Omit<QueryLogEntry, 'createdAt'>;

export interface QueryHistory {
  queries: QueryLogEntry[];
  totalCount: number;
}

/**
 * Durable record of uploaded dataset versions and the questions asked
 * against them. `register` rejects a duplicate key with
 * `RegistrationConflictError`.
 */
export interface VersionRegistry {
  register(input: RegisterVersionInput): Promise<DatasetVersion>;
  get(key: VersionKey): Promise<DatasetVersion | null>;
  getLatest(datasetId: string, userId: string, options?: LatestVersionOptions): Promise<DatasetVersion | null>;
  markStatus(key: VersionKey, status: VersionStatus): Promise<DatasetVersion | null>;
  logQuery(entry: NewQueryLogEntry): Promise<QueryLogEntry>;
  listQueries(datasetId: string, userId: string, limit: number): Promise<QueryHistory>;
  close(): Promise<void>;
}
