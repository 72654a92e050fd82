import { RegistrationConflictError } from '../errors';
import type {
  DatasetVersion,
  LatestVersionOptions,
  NewQueryLogEntry,
  QueryHistory,
  QueryLogEntry,
  RegisterVersionInput,
  VersionKey,
  VersionRegistry,
  VersionStatus
} from './types';

function versionKey(key: VersionKey): string {
  return `${key.userId}\u0000${key.datasetId}\u0000${key.versionId}`;
}

/**
 * Process-local registry used in inline mode and tests. Insertion order
 * breaks ties between versions registered within the same millisecond.
 */
export class InMemoryVersionRegistry implements VersionRegistry {
  private readonly versions = new Map<string, DatasetVersion>();
  private readonly queryLogs: QueryLogEntry[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async register(input: RegisterVersionInput): Promise<DatasetVersion> {
    const key = versionKey(input);
    if (this.versions.has(key)) {
      throw new RegistrationConflictError(input.datasetId, input.versionId, input.userId);
    }
    const timestamp = this.now().toISOString();
    const record: DatasetVersion = {
      datasetId: input.datasetId,
      versionId: input.versionId,
      userId: input.userId,
      filePath: input.filePath,
      status: 'pending',
      createdAt: timestamp,
      updatedAt: timestamp
    };
    this.versions.set(key, record);
    return { ...record };
  }

  async get(key: VersionKey): Promise<DatasetVersion | null> {
    const record = this.versions.get(versionKey(key));
    return record ? { ...record } : null;
  }

  async getLatest(
    datasetId: string,
    userId: string,
    options: LatestVersionOptions = {}
  ): Promise<DatasetVersion | null> {
    let latest: DatasetVersion | null = null;
    for (const record of this.versions.values()) {
      if (record.datasetId !== datasetId || record.userId !== userId) {
        continue;
      }
      if (options.readyOnly && record.status !== 'ready') {
        continue;
      }
      if (!latest || record.createdAt >= latest.createdAt) {
        latest = record;
      }
    }
    return latest ? { ...latest } : null;
  }

  async markStatus(key: VersionKey, status: VersionStatus): Promise<DatasetVersion | null> {
    const record = this.versions.get(versionKey(key));
    if (!record) {
      return null;
    }
    record.status = status;
    record.updatedAt = this.now().toISOString();
    return { ...record };
  }

  async logQuery(entry: NewQueryLogEntry): Promise<QueryLogEntry> {
    const record: QueryLogEntry = { ...entry, createdAt: this.now().toISOString() };
    this.queryLogs.push(record);
    return { ...record };
  }

  async listQueries(datasetId: string, userId: string, limit: number): Promise<QueryHistory> {
    const matching = this.queryLogs.filter((entry) => entry.datasetId === datasetId && entry.userId === userId);
    return {
      queries: matching
        .slice()
        .reverse()
        .slice(0, limit)
        .map((entry) => ({ ...entry })),
      totalCount: matching.length
    };
  }

  async close(): Promise<void> {
    this.versions.clear();
    this.queryLogs.length = 0;
  }
}
