#!/usr/bin/env node
import { run } from 'cmd-ts';
import { cli } from './app.js';
import { logger } from './utils/logger.js';

/**
 * clipcourier - Telegram media download bot
 */

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught exception: ${error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled rejection: ${reason}`);
  process.exit(1);
});

await run(cli, process.argv.slice(2));
