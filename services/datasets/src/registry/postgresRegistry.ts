import { isUniqueViolation, type PostgresHelpers } from '@tabletalk/shared';
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

type DatasetVersionRow = {
  dataset_id: string;
  version_id: string;
  user_id: string;
  file_path: string;
  status: VersionStatus;
  created_at: Date;
  updated_at: Date;
};

type QueryLogRow = {
  dataset_id: string;
  version_id: string;
  user_id: string;
  question: string;
  generated_sql: string;
  row_count: number;
  created_at: Date;
};

function mapVersion(row: DatasetVersionRow): DatasetVersion {
  return {
    datasetId: row.dataset_id,
    versionId: row.version_id,
    userId: row.user_id,
    filePath: row.file_path,
    status: row.status,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

function mapQueryLog(row: QueryLogRow): QueryLogEntry {
  return {
    datasetId: row.dataset_id,
    versionId: row.version_id,
    userId: row.user_id,
    question: row.question,
    generatedSql: row.generated_sql,
    rowCount: row.row_count,
    createdAt: row.created_at.toISOString()
  };
}

export class PostgresVersionRegistry implements VersionRegistry {
  constructor(private readonly db: PostgresHelpers) {}

  async register(input: RegisterVersionInput): Promise<DatasetVersion> {
    try {
      return await this.db.withConnection(async (client) => {
        const { rows } = await client.query<DatasetVersionRow>(
          `INSERT INTO dataset_versions (dataset_id, version_id, user_id, file_path, status)
           VALUES ($1, $2, $3, $4, 'pending')
           RETURNING *`,
          [input.datasetId, input.versionId, input.userId, input.filePath]
        );
        return mapVersion(rows[0]);
      });
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new RegistrationConflictError(input.datasetId, input.versionId, input.userId);
      }
      throw err;
    }
  }

  async get(key: VersionKey): Promise<DatasetVersion | null> {
    return this.db.withConnection(async (client) => {
      const { rows } = await client.query<DatasetVersionRow>(
        `SELECT * FROM dataset_versions
          WHERE dataset_id = $1 AND version_id = $2 AND user_id = $3`,
        [key.datasetId, key.versionId, key.userId]
      );
      return rows.length > 0 ? mapVersion(rows[0]) : null;
    });
  }

  async getLatest(
    datasetId: string,
    userId: string,
    options: LatestVersionOptions = {}
  ): Promise<DatasetVersion | null> {
    return this.db.withConnection(async (client) => {
      const { rows } = await client.query<DatasetVersionRow>(
        `SELECT * FROM dataset_versions
          WHERE dataset_id = $1
            AND user_id = $2
            AND ($3::boolean IS FALSE OR status = 'ready')
          ORDER BY created_at DESC
          LIMIT 1`,
        [datasetId, userId, options.readyOnly ?? false]
      );
      return rows.length > 0 ? mapVersion(rows[0]) : null;
    });
  }

  async markStatus(key: VersionKey, status: VersionStatus): Promise<DatasetVersion | null> {
    return this.db.withConnection(async (client) => {
      const { rows } = await client.query<DatasetVersionRow>(
        `UPDATE dataset_versions
            SET status = $4,
                updated_at = NOW()
          WHERE dataset_id = $1 AND version_id = $2 AND user_id = $3
          RETURNING *`,
        [key.datasetId, key.versionId, key.userId, status]
      );
      return rows.length > 0 ? mapVersion(rows[0]) : null;
    });
  }

  async logQuery(entry: NewQueryLogEntry): Promise<QueryLogEntry> {
    return this.db.withConnection(async (client) => {
      const { rows } = await client.query<QueryLogRow>(
        `INSERT INTO query_logs (dataset_id, version_id, user_id, question, generated_sql, row_count)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING dataset_id, version_id, user_id, question, generated_sql, row_count, created_at`,
        [entry.datasetId, entry.versionId, entry.userId, entry.question, entry.generatedSql, entry.rowCount]
      );
      return mapQueryLog(rows[0]);
    });
  }

  async listQueries(datasetId: string, userId: string, limit: number): Promise<QueryHistory> {
    return this.db.withConnection(async (client) => {
      const { rows } = await client.query<QueryLogRow>(
        `SELECT dataset_id, version_id, user_id, question, generated_sql, row_count, created_at
           FROM query_logs
          WHERE dataset_id = $1 AND user_id = $2
          ORDER BY created_at DESC, id DESC
          LIMIT $3`,
        [datasetId, userId, limit]
      );
      const countResult = await client.query<{ total: number }>(
        'SELECT COUNT(*)::int AS total FROM query_logs WHERE dataset_id = $1 AND user_id = $2',
        [datasetId, userId]
      );
      return {
        queries: rows.map(mapQueryLog),
        totalCount: countResult.rows[0]?.total ?? 0
      };
    });
  }

  async close(): Promise<void> {
    await this.db.closePool();
  }
}
