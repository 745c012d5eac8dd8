import { createApplication } from './app.js';
import { startServer } from './api/server.js';
import { logger } from './shared/utils/logger.js';

async function main() {
  logger.info('Starting Inquiry Quote API Server...');

  const app = createApplication();

  // Start the API server
  const server = await startServer({
    pipeline: app.pipeline,
    activity: app.activity,
    dataDir: app.dataDir,
  });

  // Handle graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received');

    await server.close();
    logger.info('Server closed');

    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error) => {
  logger.error({ error }, 'Failed to start server');
  process.exit(1);
});
