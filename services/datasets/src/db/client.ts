import { createPostgresPool, type PostgresHelpers } from '@tabletalk/shared';
import type { ServiceConfig } from '../config/serviceConfig';
import type { ServiceLogger } from '../logger';

export function createDatabase(config: ServiceConfig, logger: ServiceLogger): PostgresHelpers {
  return createPostgresPool({
    connectionString: config.database.url,
    schema: config.database.schema,
    max: config.database.maxConnections,
    idleTimeoutMillis: config.database.idleTimeoutMs,
    connectionTimeoutMillis: config.database.connectionTimeoutMs,
    onIdleError: (err) => {
      logger.error({ err }, '[tabletalk:db] unexpected error on idle client');
    }
  });
}
