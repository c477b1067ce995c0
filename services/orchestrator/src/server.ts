import process from 'node:process';

import { loadConfig } from './config';
import { createApp } from './app';

const start = async () => {
  const config = loadConfig();
  const { app } = await createApp(config);

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info({ port: config.port, host: config.host, storeMode: config.storeMode }, 'Workflow orchestrator listening');
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start workflow orchestrator');
    process.exit(1);
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down workflow orchestrator');
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
  console.error('Uncaught error in workflow orchestrator', error);
  process.exit(1);
});
