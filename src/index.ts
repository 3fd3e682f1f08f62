#!/usr/bin/env node
/**
 * Main entry point for syswatch
 */

import { SystemMonitorApp } from './app';
import { ConfigManager } from './config/config-manager';
import { Logger } from './utils/logger';

const logger = new Logger('Main');
let app: SystemMonitorApp | null = null;

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    if (app) {
      await app.stop();
      app = null;
    }

    logger.info('Graceful shutdown completed');
    process.exit(0);

  } catch (error) {
    logger.error('Error during graceful shutdown:', error);
    process.exit(1);
  }
}

/**
 * Main application startup
 */
async function main(): Promise<void> {
  try {
    logger.info('Starting syswatch...');
    logger.info(`Node version: ${process.version}`);
    logger.info(`Platform: ${process.platform}`);

    const configPath = process.argv[2] ?? process.env.SYSWATCH_CONFIG;
    app = new SystemMonitorApp({ configManager: new ConfigManager(configPath) });
    await app.initialize();
    await app.start();

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

    process.on('uncaughtException', (error) => {
      logger.error('Uncaught exception:', error);
      void gracefulShutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled promise rejection:', reason);
      void gracefulShutdown('unhandledRejection');
    });

    logger.info('syswatch started successfully');
    logger.info('Press Ctrl+C to stop');

  } catch (error) {
    logger.error('Failed to start syswatch:', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Unhandled error in main:', error);
  process.exit(1);
});
