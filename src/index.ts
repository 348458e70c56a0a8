#!/usr/bin/env node
/**
 * tokenfill entry point.
 */
import { main } from './cli.js';
import { logger } from './logger.js';

// Route unexpected errors through pino so they get timestamps in stderr
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  process.exit(1);
});

process.exitCode = main(process.argv);
