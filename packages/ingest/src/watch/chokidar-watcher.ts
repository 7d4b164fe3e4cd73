/**
 * Filesystem watch backed by chokidar.
 */

import chokidar, { type WatchOptions as ChokidarOptions } from 'chokidar';
import type { CreatedFileHandler, FileWatchAdapter, WatchOptions, WatchSubscription } from '@nfe-intake/contracts';
import { createSilentLogger, errorMessage, type Logger } from '@nfe-intake/shared';

export interface ChokidarWatchAdapterOptions {
  logger?: Logger;
  /**
   * Extra chokidar options, e.g. `usePolling` for network shares
   */
  watchOptions?: ChokidarOptions;
}

export class ChokidarWatchAdapter implements FileWatchAdapter {
  private readonly logger: Logger;

  constructor(private readonly options: ChokidarWatchAdapterOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Watch `root` for created files. Files present before the call are not
   * reported; resolves after chokidar's initial scan.
   */
  async watch(root: string, options: WatchOptions, onCreated: CreatedFileHandler): Promise<WatchSubscription> {
    const watcher = chokidar.watch(root, {
      persistent: true,
      ignoreInitial: true,
      ...(options.recursive ? {} : { depth: 0 }),
      ...this.options.watchOptions,
    });

    watcher
      .on('add', (filePath: string) => {
        this.deliver(onCreated, filePath);
      })
      .on('error', (error: unknown) => {
        this.logger.error('Watcher error', { root, error: errorMessage(error) });
      });

    await new Promise<void>((resolve) => {
      watcher.once('ready', () => resolve());
    });

    this.logger.debug('Watching directory', { root, recursive: options.recursive });

    return {
      close: () => watcher.close(),
    };
  }

  private deliver(onCreated: CreatedFileHandler, filePath: string): void {
    Promise.resolve()
      .then(() => onCreated(filePath))
      .catch((error: unknown) => {
        this.logger.error('File handler failed', { filePath, error: errorMessage(error) });
      });
  }
}
