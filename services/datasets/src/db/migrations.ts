import type { PoolClient } from 'pg';
import type { PostgresHelpers } from '@tabletalk/shared';

interface Migration {
  id: string;
  statements: string[];
}

const migrations: Migration[] = [
  {
    id: '001_dataset_versions',
    statements: [
      `CREATE TABLE IF NOT EXISTS dataset_versions (
         dataset_id TEXT NOT NULL,
         version_id TEXT NOT NULL,
         user_id TEXT NOT NULL,
         file_path TEXT NOT NULL,
         status TEXT NOT NULL DEFAULT 'pending',
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         PRIMARY KEY (dataset_id, version_id, user_id),
         CHECK (status IN ('pending', 'ready', 'failed'))
       );`,
      `CREATE INDEX IF NOT EXISTS idx_dataset_versions_latest
         ON dataset_versions(dataset_id, user_id, created_at DESC);`
    ]
  },
  {
    id: '002_query_logs',
    statements: [
      `CREATE TABLE IF NOT EXISTS query_logs (
         id BIGSERIAL PRIMARY KEY,
         dataset_id TEXT NOT NULL,
         version_id TEXT NOT NULL,
         user_id TEXT NOT NULL,
         question TEXT NOT NULL,
         generated_sql TEXT NOT NULL,
         row_count INTEGER NOT NULL DEFAULT 0,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       );`,
      `CREATE INDEX IF NOT EXISTS idx_query_logs_dataset_user
         ON query_logs(dataset_id, user_id, created_at DESC);`
    ]
  }
];

export async function runMigrations(db: PostgresHelpers): Promise<void> {
  await db.ensureSchema();
  const applied = await db.withConnection(async (client) => {
    await ensureSchemaMigrationsTable(client);
    const { rows } = await client.query<{ id: string }>('SELECT id FROM schema_migrations');
    return new Set(rows.map((row) => row.id));
  });

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }
    await db.withTransaction(async (client) => {
      for (const statement of migration.statements) {
        await client.query(statement);
      }
      await client.query('INSERT INTO schema_migrations (id) VALUES ($1) ON CONFLICT DO NOTHING', [migration.id]);
    });
  }
}

async function ensureSchemaMigrationsTable(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}
