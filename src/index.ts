/**
 * Crossover Signal Bot
 *
 * Entry point for the application.
 * Handles process signals for graceful shutdown.
 */

import 'dotenv/config';
import { App } from './app.js';
import { ConfigurationError, loadConfig } from './config.js';
import { logger, errorMessage } from './logger.js';

let app: App | null = null;
let shuttingDown = false;

// Graceful shutdown handler
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    await app?.stop(`Received ${signal}`);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

// Register signal handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  void shutdown('uncaughtException');
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  void shutdown('unhandledRejection');
});

async function main(): Promise<void> {
  logger.info('='.repeat(50));
  logger.info('Crossover Signal Bot');
  logger.info('='.repeat(50));

  let instance: App;
  try {
    instance = new App(loadConfig());
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error('Invalid configuration', { error: error.message });
      process.exit(1);
    }
    throw error;
  }
  app = instance;

  try {
    await instance.start();

    // Log status periodically
    setInterval(() => {
      logger.debug('Application status', instance.getStatus());
    }, 60000); // Every minute
  } catch (error) {
    logger.error('Failed to start application', { error: errorMessage(error) });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
