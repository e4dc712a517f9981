import { createApp } from './app';
import { env } from './config/environment';
import { logger } from './config/logger';
import { closeConnection, testConnection } from './config/database';

/**
 * Application Entry Point
 *
 * Starts the Express server and handles graceful shutdown
 */

const SHUTDOWN_TIMEOUT_MS = 10000;

async function startServer(): Promise<void> {
  try {
    // Verify database connection before starting server
    if (!(await testConnection())) {
      throw new Error('Database connection failed');
    }

    const { app, checklistService } = createApp();

    // Warm the checklist so the first request does not pay for the load
    const items = await checklistService.listItems();

    const server = app.listen(env.PORT, () => {
      logger.info('Checklist API listening', {
        environment: env.NODE_ENV,
        port: env.PORT,
        items: items.length,
        insertAtTop: env.INSERT_AT_TOP,
        docs: `http://localhost:${env.PORT}/docs`,
      });
    });

    const gracefulShutdown = (signal: string) => {
      logger.info(`${signal} received, starting graceful shutdown...`);

      const { unsavedChanges } = checklistService.getStatus();
      if (unsavedChanges > 0) {
        logger.warn('Shutting down with unsaved checklist changes', { unsavedChanges });
      }

      server.close(() => {
        logger.info('HTTP server closed');
        closeConnection();
        process.exit(0);
      });

      // Force shutdown if connections do not drain
      setTimeout(() => {
        logger.error('Could not close connections in time, forcefully shutting down');
        process.exit(1);
      }, SHUTDOWN_TIMEOUT_MS).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    process.on('uncaughtException', (error: Error) => {
      logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
      gracefulShutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection', { reason });
      gracefulShutdown('unhandledRejection');
    });
  } catch (error) {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

void startServer();
