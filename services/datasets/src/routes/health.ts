import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/health', async () => ({
    status: 'ok',
    queue: { mode: ctx.dispatcher.mode }
  }));
};
