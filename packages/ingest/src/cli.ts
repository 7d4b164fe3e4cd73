#!/usr/bin/env node
/**
 * nfe-intake entry point.
 *
 * Loads the configuration, opens the database, processes the files already
 * waiting and keeps watching until SIGINT or SIGTERM.
 */

import { join } from 'node:path';
import process from 'node:process';
import type { IntakeConfig } from '@nfe-intake/contracts';
import {
  ConfigurationError,
  consoleSink,
  createFileSink,
  createLogger,
  errorMessage,
  type Logger,
} from '@nfe-intake/shared';
import { createPostgresDocumentStore, maskConnectionString } from '@nfe-intake/storage';
import { parseCliOptions, printHelp } from './cli/options.js';
import { loadConfig } from './config/load-config.js';
import { IngestPipeline } from './pipeline/pipeline.js';
import { FileRouter } from './router/file-router.js';
import { ChokidarWatchAdapter } from './watch/chokidar-watcher.js';

function createAppLogger(config: IntakeConfig): Logger {
  const fileSink = createFileSink({
    directory: config.logging.directory,
    fileName: config.logging.fileName,
    frequency: config.logging.rotation.frequency,
    backupCount: config.logging.rotation.backupCount,
  });
  return createLogger({ level: config.logging.level, sinks: [consoleSink, fileSink] });
}

function logStartup(logger: Logger, config: IntakeConfig, configPath: string): void {
  const { processor, logging } = config;
  logger.info('Starting NF-e intake', { configPath });
  logger.info('Logging configured', {
    file: join(logging.directory, logging.fileName),
    rotation: logging.rotation.frequency,
    backupCount: logging.rotation.backupCount,
  });
  logger.info('Directories', {
    watched: processor.watchedPath,
    processed: processor.processedPath,
    errors: processor.errorPath,
  });
  logger.info('Database', { url: maskConnectionString(processor.databaseUrl) });
  logger.info('Recursive search', { enabled: processor.recursive });
}

async function main(): Promise<void> {
  const options = parseCliOptions(process.argv.slice(2));
  if (options.help) {
    printHelp();
    return;
  }

  const config = await loadConfig(options.configPath);
  const logger = createAppLogger(config);
  logStartup(logger, config, options.configPath);

  const store = await createPostgresDocumentStore(config.processor.databaseUrl);
  const pipeline = new IngestPipeline({
    config: config.processor,
    store,
    router: new FileRouter(config.processor),
    watcher: new ChokidarWatchAdapter({ logger: logger.child({ component: 'watcher' }) }),
    logger,
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    try {
      await pipeline.stop();
      await store.close();
      logger.info('Shutdown complete', { ...pipeline.stats() });
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    }
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  try {
    await store.initialize();
    logger.info('Database schema ready');
    await pipeline.start();
  } catch (error) {
    logger.error('Startup failed', { error: errorMessage(error) });
    await pipeline.stop();
    await store.close();
    throw error;
  }

  logger.info('Watching for new files; press Ctrl+C to stop');
}

main().catch((error: unknown) => {
  console.error(`nfe-intake: ${errorMessage(error)}`);
  if (error instanceof ConfigurationError) {
    console.error('Copy config.example.yaml to config.yaml and adjust it, or pass --config <file>.');
  }
  process.exit(1);
});
