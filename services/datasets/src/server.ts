import process from 'node:process';

import { createApp } from './app';
import { loadServiceConfig } from './config/serviceConfig';

const start = async () => {
  const config = loadServiceConfig();
  const { app, ctx } = await createApp(config);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      { port: config.port, host: config.host, queueMode: ctx.dispatcher.mode },
      'tabletalk datasets service listening'
    );
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start datasets service');
    process.exit(1);
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down datasets service');
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));
};

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught error in datasets service', error);
  process.exit(1);
});
