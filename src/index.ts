#!/usr/bin/env node

/**
 * Batch Classification Service - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { createApplication } from './app.js';
import { configureLogging, createLogger } from './infrastructure/logging/logger.js';
import { errorMessage } from './core/errors.js';

const logger = createLogger('Main');

async function main() {
  const config = getConfig();
  configureLogging(config.service.logLevel);
  printConfigInfo(config);

  let startFailed = false;
  const app = createApplication(config, {
    exit: (code) => process.exit(startFailed ? 1 : code),
  });
  const { shutdown } = app;

  process.on('SIGINT', () => shutdown.trigger('SIGINT'));
  process.on('SIGTERM', () => shutdown.trigger('SIGTERM'));

  process.on('uncaughtException', (error) => {
    logger.error(`💥 Uncaught exception: ${error.stack ?? error.message}`);
    shutdown.trigger('uncaught exception');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`💥 Unhandled rejection: ${errorMessage(reason)}`);
    shutdown.trigger('unhandled rejection');
  });

  try {
    await app.start();
  } catch (error) {
    logger.error(`💥 Failed to start: ${errorMessage(error)}`);
    startFailed = true;
    await shutdown.run('startup failure');
    return;
  }

  console.error(`\n🚀 ${config.service.name} is running. Press Ctrl+C to stop.\n`);
}

main().catch((error: unknown) => {
  console.error('💥 Fatal error in main():', error);
  process.exit(1);
});
