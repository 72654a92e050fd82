import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';
import { askBodySchema, datasetParamsSchema, historyQuerySchema } from './schemas';

export const registerQueryRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/query/ask', async (request) => {
    const body = askBodySchema.parse(request.body);
    const result = await ctx.queries.ask({
      datasetId: body.dataset_id,
      userId: body.user_id,
      question: body.question,
      versionId: body.version_id
    });
    return {
      answer: result.answer,
      raw_answer: result.rawAnswer,
      generated_sql: result.generatedSql,
      version_id: result.versionId,
      preview: {
        columns: result.preview.columns,
        rows: result.preview.rows,
        total_rows: result.preview.totalRows
      }
    };
  });

  app.get('/query/history/:dataset_id', async (request) => {
    const { dataset_id: datasetId } = datasetParamsSchema.parse(request.params);
    const { user_id: userId, limit } = historyQuerySchema.parse(request.query);
    const history = await ctx.queries.history(datasetId, userId, limit);
    return {
      queries: history.queries.map((entry) => ({
        dataset_id: entry.datasetId,
        version_id: entry.versionId,
        user_id: entry.userId,
        question: entry.question,
        generated_sql: entry.generatedSql,
        row_count: entry.rowCount,
        created_at: entry.createdAt
      })),
      total_count: history.totalCount
    };
  });
};
