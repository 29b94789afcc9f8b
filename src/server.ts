import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { logger } from './observability';

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info(getEnvironmentInfo(), `Server running on port ${config.port}`);
});

const shutdown = (signal: string): void => {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close((error) => {
    if (error) {
      logger.error({ error: error.message }, 'Error during shutdown');
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
