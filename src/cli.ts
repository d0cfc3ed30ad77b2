#!/usr/bin/env node
import { env } from './config/environment';
import { logger } from './config/logger';
import { runDemo } from './demo';

/**
 * Application Entry Point
 *
 * Prints the demonstration stock reports to stdout; logs go to stderr.
 */
try {
  logger.info('Starting bottle stock demonstration', {
    environment: env.NODE_ENV,
    flagBreakage: env.FLAG_BREAKAGE_ON_START,
  });

  for (const line of runDemo()) {
    console.log(line);
  }
} catch (error) {
  logger.error('Demonstration failed', { error });
  process.exit(1);
}
