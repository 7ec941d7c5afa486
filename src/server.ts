import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { logger } from './observability';
import { getLedgerStore } from './store';

const app = createApp();

const startServer = async (): Promise<void> => {
  try {
    const store = getLedgerStore();

    if (store.driver === 'mongo') {
      await connectDatabase();
    } else {
      logger.warn('Using the in-memory ledger store; data is lost on restart');
    }

    // Start HTTP server
    const server = app.listen(config.port, () => {
      logger.info({ port: config.port, ...getEnvironmentInfo() }, 'Server started');
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');

        disconnectDatabase()
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
