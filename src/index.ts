#!/usr/bin/env node
/**
 * Main entry point for the network status monitor
 */

import { NetworkStatusApp } from './app';
import { Logger } from './utils/logger';

const logger = new Logger('Main');
let app: NetworkStatusApp | null = null;
let shuttingDown = false;

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string, exitCode: number = 0): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    if (app) {
      await app.stop();
      app = null;
    }

    logger.info('Graceful shutdown completed');
    process.exit(exitCode);
  } catch (error) {
    logger.error('Error during graceful shutdown:', error);
    process.exit(1);
  }
}

/**
 * Main application startup
 */
async function main(): Promise<void> {
  logger.info('Starting network status monitor...');
  logger.info(`Node version: ${process.version}`);
  logger.info(`Platform: ${process.platform}`);

  app = new NetworkStatusApp();
  await app.initialize();
  await app.start();

  // Set up signal handlers for graceful shutdown
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', error);
    void gracefulShutdown('uncaughtException', 1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled promise rejection:', reason);
    void gracefulShutdown('unhandledRejection', 1);
  });

  logger.info('Press Ctrl+C to stop');
}

main().catch((error) => {
  logger.error('Failed to start network status monitor:', error);
  process.exit(1);
});
