import type { FastifyInstance } from 'fastify';

import { VersionNotFoundError } from '../errors';
import type { AppContext } from '../types';
import { datasetParamsSchema, serializeVersion, userQuerySchema, versionParamsSchema } from './schemas';

export const registerVersionRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/ingestion/datasets/:dataset_id/versions/latest', async (request) => {
    const { dataset_id: datasetId } = datasetParamsSchema.parse(request.params);
    const { user_id: userId } = userQuerySchema.parse(request.query);

    const version = await ctx.registry.getLatest(datasetId, userId);
    if (!version) {
      throw new VersionNotFoundError(datasetId);
    }
    return serializeVersion(version);
  });

  app.get('/ingestion/datasets/:dataset_id/versions/:version_id', async (request) => {
    const { dataset_id: datasetId, version_id: versionId } = versionParamsSchema.parse(request.params);
    const { user_id: userId } = userQuerySchema.parse(request.query);

    const version = await ctx.registry.get({ datasetId, versionId, userId });
    if (!version) {
      throw new VersionNotFoundError(datasetId, versionId);
    }
    return serializeVersion(version);
  });

  app.get('/ingestion/datasets/:dataset_id/versions/:version_id/schema', async (request) => {
    const params = versionParamsSchema.parse(request.params);
    const { user_id: userId } = userQuerySchema.parse(request.query);

    const versionId = await ctx.queries.resolveVersion(params.dataset_id, userId, params.version_id);
    const schema = await ctx.queries.describeTable(userId, params.dataset_id, versionId);
    return {
      table_name: schema.tableName,
      columns: schema.columns,
      row_count: schema.rowCount
    };
  });
};
