import type { ServiceConfig } from './config/serviceConfig';
import type { IngestionDispatcher } from './queue';
import type { QueryService } from './query/queryService';
import type { VersionRegistry } from './registry/types';
import type { ChunkStore } from './staging/chunkStore';
import type { DuckDbTableStore } from './tables/materializer';

export interface AppContext {
  config: ServiceConfig;
  chunks: ChunkStore;
  registry: VersionRegistry;
  tables: DuckDbTableStore;
  dispatcher: IngestionDispatcher;
  queries: QueryService;
}
