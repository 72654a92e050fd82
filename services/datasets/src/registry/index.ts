import { randomUUID } from 'node:crypto';
import type { PostgresHelpers } from '@tabletalk/shared';
import type { ServiceConfig } from '../config/serviceConfig';
import { createDatabase } from '../db/client';
import { runMigrations } from '../db/migrations';
import type { ServiceLogger } from '../logger';
import { InMemoryVersionRegistry } from './memoryRegistry';
import { PostgresVersionRegistry } from './postgresRegistry';
import type { VersionRegistry } from './types';

export * from './types';
export { InMemoryVersionRegistry } from './memoryRegistry';
export { PostgresVersionRegistry } from './postgresRegistry';

export async function createVersionRegistry(
  config: ServiceConfig,
  logger: ServiceLogger,
  database?: PostgresHelpers
): Promise<VersionRegistry> {
  if (config.registry.driver === 'memory') {
    logger.warn('[tabletalk:registry] using in-memory registry; versions are lost on restart');
    return new InMemoryVersionRegistry();
  }
  const db = database ?? createDatabase(config, logger);
  await runMigrations(db);
  return new PostgresVersionRegistry(db);
}

/** Short random identifier: the first eight hex digits of a v4 UUID. */
export function generateVersionId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 8);
}
