#!/usr/bin/env node
import 'dotenv/config';
import { SeasonReminder } from './reminder.js';
import { loadConfig } from './utils/config.js';
import { ConfigurationError } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function main(): Promise<number> {
  let reminder: SeasonReminder;
  try {
    const config = loadConfig();
    logger.setLevel(config.debug ? 'debug' : config.logLevel);
    logger.debug(`Logging initialized at ${logger.getLevel()} level`);
    reminder = new SeasonReminder(config);

    if (config.runMode === 'daemon') {
      const shutdown = (signal: string) => {
        logger.info(`\nReceived ${signal}, shutting down...`);
        reminder.stop();
        process.exit(0);
      };
      process.on('SIGINT', () => shutdown('SIGINT'));
      process.on('SIGTERM', () => shutdown('SIGTERM'));
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`Invalid configuration: ${error.message}`);
    } else {
      logger.error('Error loading configuration:', error);
    }
    return 1;
  }

  try {
    const ok = await reminder.start();
    return ok ? 0 : 1;
  } catch (error) {
    logger.error('Unexpected error:', error instanceof Error ? error.message : error);
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return 1;
  }
}

main().then((code) => {
  // Daemon mode keeps running on its cron timer
  if (code !== 0) {
    process.exit(code);
  }
  process.exitCode = code;
});
