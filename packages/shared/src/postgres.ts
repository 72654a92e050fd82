import pg, { Pool, type PoolClient, type PoolConfig } from 'pg';

let int8Configured = false;

function configureGlobalParsers(): void {
  if (int8Configured) {
    return;
  }
  // row counts come back as INT8; they comfortably fit in a JS number here
  pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
  int8Configured = true;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export interface PostgresAcquireOptions {
  setSearchPath?: boolean;
}

export interface PostgresPoolOptions extends PoolConfig {
  schema?: string;
  onIdleError?: (err: Error) => void;
}

export interface PostgresHelpers {
  withConnection<T>(fn: (client: PoolClient) => Promise<T>, options?: PostgresAcquireOptions): Promise<T>;
  withTransaction<T>(fn: (client: PoolClient) => Promise<T>, options?: PostgresAcquireOptions): Promise<T>;
  ensureSchema(): Promise<void>;
  closePool(): Promise<void>;
}

export function createPostgresPool(options: PostgresPoolOptions = {}): PostgresHelpers {
  configureGlobalParsers();
  const { schema, onIdleError, ...poolConfig } = options;
  const pool = new Pool(poolConfig);

  pool.on('error', (err: Error) => {
    if (onIdleError) {
      onIdleError(err);
      return;
    }
    console.error('[postgres] unexpected error on idle client', err);
  });

  async function acquire(acquireOptions?: PostgresAcquireOptions): Promise<PoolClient> {
    const client = await pool.connect();
    if (!schema || acquireOptions?.setSearchPath === false) {
      return client;
    }
    try {
      await client.query(`SET search_path TO ${quoteIdentifier(schema)}, public`);
    } catch (err) {
      client.release();
      throw err;
    }
    return client;
  }

  async function withConnection<T>(
    fn: (client: PoolClient) => Promise<T>,
    acquireOptions?: PostgresAcquireOptions
  ): Promise<T> {
    const client = await acquire(acquireOptions);
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  async function withTransaction<T>(
    fn: (client: PoolClient) => Promise<T>,
    acquireOptions?: PostgresAcquireOptions
  ): Promise<T> {
    return withConnection(async (client) => {
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          console.error('[postgres] failed to rollback transaction', rollbackErr);
        }
        throw err;
      }
    }, acquireOptions);
  }

  async function ensureSchema(): Promise<void> {
    if (!schema) {
      return;
    }
    await withConnection(async (client) => {
      // parallel service + worker startup would otherwise race on CREATE SCHEMA
      const lockKey = `tabletalk:schema:${schema}`;
      await client.query('SELECT pg_advisory_lock(hashtext($1))', [lockKey]);
      try {
        await client.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(schema)}`);
      } finally {
        await client.query('SELECT pg_advisory_unlock(hashtext($1))', [lockKey]);
      }
    }, { setSearchPath: false });
  }

  async function closePool(): Promise<void> {
    await pool.end();
  }

  return {
    withConnection,
    withTransaction,
    ensureSchema,
    closePool
  };
}

/** Postgres SQLSTATE 23505. */
export function isUniqueViolation(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }
  return 'code' in error && error.code === '23505';
}
