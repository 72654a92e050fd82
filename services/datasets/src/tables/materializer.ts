import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { DuckDBConnection } from '@duckdb/node-api';
import {
  all,
  firstRow,
  quoteDuckDbIdentifier,
  quoteDuckDbLiteral,
  readAll,
  run,
  withDuckDbConnection,
  type DuckDbResultSet
} from '@tabletalk/shared';
import { SchemaInferenceError } from '../errors';
import { isMissing } from '../staging/chunkStore';
import { KeyedLock } from './keyedLock';

const NAMESPACE_FILE = 'db.duckdb';
const LOCK_RETRY_ATTEMPTS = 4;
const LOCK_RETRY_BASE_DELAY_MS = 100;

export interface ColumnInfo {
  name: string;
  type: string;
}

export interface TableDescription {
  columns: ColumnInfo[];
  rowCount: number;
}

export interface MaterializedTableInfo extends TableDescription {
  tableName: string;
  databasePath: string;
}

export interface MaterializeOptions {
  /** Aborting interrupts the running statement and drops whatever it created. */
  signal?: AbortSignal;
}

export interface TableMaterializer {
  materialize(
    userId: string,
    datasetId: string,
    versionId: string,
    sourceFilePath: string,
    options?: MaterializeOptions
  ): Promise<MaterializedTableInfo>;
  dropTable(userId: string, tableName: string): Promise<void>;
  namespaceExists(userId: string): Promise<boolean>;
  namespacePath(userId: string): string;
}

export interface TableReader {
  describe(userId: string, tableName: string): Promise<TableDescription | null>;
  listTables(userId: string): Promise<string[]>;
  sample(userId: string, tableName: string, limit: number): Promise<DuckDbResultSet>;
  execute(userId: string, sql: string): Promise<DuckDbResultSet>;
}

export function buildTableName(datasetId: string, versionId: string): string {
  return `${datasetId}_v${versionId}`;
}

function isLockConflict(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return /could not set lock|conflicting lock/i.test(message);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function fileExists(target: string): Promise<boolean> {
  try {
    const stats = await fs.stat(target);
    return stats.isFile();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
}

async function describeWith(connection: DuckDBConnection, tableName: string): Promise<TableDescription | null> {
  const columnRows = await all(
    connection,
    `SELECT column_name, data_type
       FROM information_schema.columns
      WHERE table_schema = 'main' AND table_name = $1
      ORDER BY ordinal_position`,
    [tableName]
  );
  if (columnRows.length === 0) {
    return null;
  }
  const columns = columnRows.map((row) => ({
    name: String(row.column_name),
    type: String(row.data_type)
  }));
  const countRow = await firstRow(
    connection,
    `SELECT count(*)::BIGINT AS row_count FROM ${quoteDuckDbIdentifier(tableName)}`
  );
  return { columns, rowCount: Number(countRow?.row_count ?? 0) };
}

/**
 * One DuckDB file per user at `{duckdbRoot}/{userId}/db.duckdb`.
 *
 * Every operation opens and closes its own handle. Operations on the same
 * user are serialized so that table replacement never overlaps a read
 * within this process; lock conflicts with another process are retried
 * with exponential backoff.
 */
export class DuckDbTableStore implements TableMaterializer, TableReader {
  private readonly locks = new KeyedLock();

  constructor(private readonly duckdbRoot: string) {}

  namespacePath(userId: string): string {
    return path.join(this.duckdbRoot, userId, NAMESPACE_FILE);
  }

  async namespaceExists(userId: string): Promise<boolean> {
    return fileExists(this.namespacePath(userId));
  }

  async materialize(
    userId: string,
    datasetId: string,
    versionId: string,
    sourceFilePath: string,
    options: MaterializeOptions = {}
  ): Promise<MaterializedTableInfo> {
    const { signal } = options;
    signal?.throwIfAborted();
    const tableName = buildTableName(datasetId, versionId);
    const databasePath = this.namespacePath(userId);
    await fs.mkdir(path.dirname(databasePath), { recursive: true });

    const description = await this.withNamespace(userId, false, async (connection) => {
      signal?.throwIfAborted();
      const interrupt = () => connection.interrupt();
      signal?.addEventListener('abort', interrupt, { once: true });
      try {
        try {
          await run(
            connection,
            `CREATE OR REPLACE TABLE ${quoteDuckDbIdentifier(tableName)} AS
               SELECT * FROM read_csv_auto(${quoteDuckDbLiteral(sourceFilePath)})`
          );
        } catch (error) {
          signal?.throwIfAborted();
          if (isLockConflict(error)) {
            throw error;
          }
          throw new SchemaInferenceError(tableName, error);
        }
        if (signal?.aborted) {
          // the statement finished before the interrupt landed
          await run(connection, `DROP TABLE IF EXISTS ${quoteDuckDbIdentifier(tableName)}`);
          signal.throwIfAborted();
        }
        return describeWith(connection, tableName);
      } finally {
        signal?.removeEventListener('abort', interrupt);
      }
    });

    if (!description) {
      throw new SchemaInferenceError(tableName, new Error('table missing after creation'));
    }
    return { tableName, databasePath, ...description };
  }

  async dropTable(userId: string, tableName: string): Promise<void> {
    if (!(await this.namespaceExists(userId))) {
      return;
    }
    await this.withNamespace(userId, false, (connection) =>
      run(connection, `DROP TABLE IF EXISTS ${quoteDuckDbIdentifier(tableName)}`)
    );
  }

  async describe(userId: string, tableName: string): Promise<TableDescription | null> {
    if (!(await this.namespaceExists(userId))) {
      return null;
    }
    return this.withNamespace(userId, true, (connection) => describeWith(connection, tableName));
  }

  async listTables(userId: string): Promise<string[]> {
    if (!(await this.namespaceExists(userId))) {
      return [];
    }
    const rows = await this.withNamespace(userId, true, (connection) =>
      all(
        connection,
        `SELECT table_name FROM information_schema.tables
          WHERE table_schema = 'main'
          ORDER BY table_name`
      )
    );
    return rows.map((row) => String(row.table_name));
  }

  async sample(userId: string, tableName: string, limit: number): Promise<DuckDbResultSet> {
    return this.withNamespace(userId, true, (connection) =>
      readAll(connection, `SELECT * FROM ${quoteDuckDbIdentifier(tableName)} ORDER BY random() LIMIT ${Math.max(0, Math.floor(limit))}`)
    );
  }

  async execute(userId: string, sql: string): Promise<DuckDbResultSet> {
    return this.withNamespace(userId, true, (connection) => readAll(connection, sql));
  }

  private async withNamespace<T>(
    userId: string,
    readOnly: boolean,
    fn: (connection: DuckDBConnection) => Promise<T>
  ): Promise<T> {
    return this.locks.run(userId, async () => {
      for (let attempt = 1; ; attempt += 1) {
        try {
          return await withDuckDbConnection(this.namespacePath(userId), fn, { readOnly });
        } catch (error) {
          if (!isLockConflict(error) || attempt >= LOCK_RETRY_ATTEMPTS) {
            throw error;
          }
          await delay(LOCK_RETRY_BASE_DELAY_MS * 2 ** (attempt - 1));
        }
      }
    });
  }
}
