#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { Logger, setLogLevel } from './common/logger.js';
import { NodeFetchClient } from './adapters/node/node-fetch-client.js';
import {
  assertBotConfig,
  loadEnvironmentFiles,
  loadTrackerConfig,
  resolveTimeZone,
} from './config/tracker.config.js';
import { ConfigValidationError } from './config/validators/config-validator.js';
import { ShutdownService } from './modules/shutdown/shutdown.service.js';
import { TrackerStorageFactory } from './modules/storage/storage/tracker-storage.factory.js';
import { createTracker } from './modules/tracker/create-tracker.js';

const logger = new Logger('Bot');

const USAGE = `Usage: article-tracker-bot [options]

Options:
  --test      Send a test notification and exit
  --verbose   Enable debug logging
  -h, --help  Show this help`;

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      test: { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  loadEnvironmentFiles();
  const config = loadTrackerConfig();

  if (values.verbose) {
    setLogLevel('debug');
  } else {
    setLogLevel(config.logLevel);
  }

  logger.log('='.repeat(50));
  logger.log('  ARTICLE TRACKER BOT v2');
  logger.log('='.repeat(50));

  assertBotConfig(config);
  const timeZone = resolveTimeZone(config.timezone, logger);

  logger.log('Initializing storage...');
  const storage = TrackerStorageFactory.create(config.storage);
  await storage.init();

  const { trackerService, pollerService } = createTracker({
    config,
    storage,
    fetchClient: new NodeFetchClient(),
    timeZone,
  });

  if (values.test) {
    const delivered = await trackerService.sendTestNotification();
    await storage.close();
    process.exitCode = delivered ? 0 : 1;
    return;
  }

  const shutdownService = new ShutdownService();
  shutdownService.onShutdown('storage', () => storage.close());

  const polling = pollerService.run(shutdownService.signal);
  shutdownService.onShutdown('poller', () => polling);
  shutdownService.listen();

  await polling;
  await shutdownService.shutdown('poller stopped');
}

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    logger.error(`Invalid configuration: ${error.message}`);
  } else {
    logger.error('Bot crashed', error);
  }
  process.exit(1);
});
