import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api';

type DuckDbReader = Awaited<ReturnType<DuckDBConnection['runAndReadAll']>>;

export type DuckDbRow = ReturnType<DuckDbReader['getRowObjectsJson']>[number];

export type DuckDbParam = string | number | boolean | null;

export interface DuckDbAcquireOptions {
  readOnly?: boolean;
}

/**
 * Opens the database file, hands a fresh connection to `fn` and closes both
 * afterwards, so the file lock is only held for the duration of the call.
 */
export async function withDuckDbConnection<T>(
  databasePath: string,
  fn: (connection: DuckDBConnection) => Promise<T>,
  options: DuckDbAcquireOptions = {}
): Promise<T> {
  const instance = await DuckDBInstance.create(
    databasePath,
    options.readOnly ? { access_mode: 'READ_ONLY' } : undefined
  );
  try {
    const connection = await instance.connect();
    try {
      return await fn(connection);
    } finally {
      connection.closeSync();
    }
  } finally {
    instance.closeSync();
  }
}

export async function run(connection: DuckDBConnection, sql: string, params: DuckDbParam[] = []): Promise<void> {
  if (params.length > 0) {
    await connection.run(sql, params);
    return;
  }
  await connection.run(sql);
}

export interface DuckDbResultSet {
  columns: string[];
  rows: DuckDbRow[];
}

export async function readAll(
  connection: DuckDBConnection,
  sql: string,
  params: DuckDbParam[] = []
): Promise<DuckDbResultSet> {
  const reader = params.length > 0 ? await connection.runAndReadAll(sql, params) : await connection.runAndReadAll(sql);
  return {
    columns: reader.columnNames(),
    rows: reader.getRowObjectsJson()
  };
}

export async function all(connection: DuckDBConnection, sql: string, params: DuckDbParam[] = []): Promise<DuckDbRow[]> {
  const { rows } = await readAll(connection, sql, params);
  return rows;
}

export async function firstRow(
  connection: DuckDBConnection,
  sql: string,
  params: DuckDbParam[] = []
): Promise<DuckDbRow | null> {
  const rows = await all(connection, sql, params);
  return rows.length > 0 ? rows[0] : null;
}

export function quoteDuckDbIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

export function quoteDuckDbLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
