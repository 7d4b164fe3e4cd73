import { mkdir, readFile, stat } from 'node:fs/promises';
import { basename, extname, isAbsolute, relative, resolve, sep } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import pLimit, { type LimitFunction } from 'p-limit';
import type {
  CommitResult,
  DocumentStore,
  FileWatchAdapter,
  IngestEvents,
  IngestOutcome,
  IngestStats,
  ProcessorConfig,
  WatchSubscription,
} from '@nfe-intake/contracts';
import { extractDocument, parseDocument } from '@nfe-intake/parser';
import { createSilentLogger, errorMessage, IntakeError, type Logger } from '@nfe-intake/shared';
import type { DocumentRouter } from '../router/file-router.js';
import { sweepBacklog } from '../sweep/backlog-sweep.js';

type CommittedOutcome = Extract<IngestOutcome, { status: 'committed' }>;
type RejectedOutcome = Extract<IngestOutcome, { status: 'rejected' }>;

export type PipelineSettings = Omit<ProcessorConfig, 'databaseUrl'>;

export interface IngestPipelineOptions {
  config: PipelineSettings;
  store: DocumentStore;
  router: DocumentRouter;
  watcher: FileWatchAdapter;
  logger?: Logger;
  events?: IngestEvents;
}

type PipelineState = 'idle' | 'running' | 'stopping' | 'stopped';

/**
 * IngestPipeline drives documents from the watched directory into the store.
 *
 * Startup registers the live watch first and buffers its notifications, then
 * sweeps the files already present, then releases the buffer. A file is
 * therefore seen at least once, and the existence check after the settle
 * wait drops notifications for files the sweep already moved.
 *
 * Every ingested file ends in exactly one terminal place: the processed area
 * with its rows committed, or the error area without rows. The processed-area
 * move runs inside the store transaction, before COMMIT.
 *
 * @example
 * ```typescript
 * const pipeline = new IngestPipeline({
 *   config: config.processor,
 *   store,
 *   router: new FileRouter(config.processor),
 *   watcher: new ChokidarWatchAdapter({ logger }),
 *   logger,
 * });
 *
 * await pipeline.start();
 * process.once('SIGTERM', () => void pipeline.stop());
 * ```
 */
export class IngestPipeline {
  private readonly config: PipelineSettings;
  private readonly store: DocumentStore;
  private readonly router: DocumentRouter;
  private readonly watcher: FileWatchAdapter;
  private readonly logger: Logger;
  private readonly events: IngestEvents;

  private readonly liveLimit: LimitFunction;
  private readonly inFlight = new Set<string>();
  private readonly pending = new Set<Promise<void>>();
  private readonly abort = new AbortController();
  private readonly counters: IngestStats = { committed: 0, rejected: 0, unresolved: 0, vanished: 0 };

  private state: PipelineState = 'idle';
  private subscription: WatchSubscription | null = null;
  private buffered: string[] | null = null;
  private backlog: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: IngestPipelineOptions) {
    this.config = {
      ...options.config,
      watchedPath: resolve(options.config.watchedPath),
      processedPath: resolve(options.config.processedPath),
      errorPath: resolve(options.config.errorPath),
    };
    this.store = options.store;
    this.router = options.router;
    this.watcher = options.watcher;
    this.logger = options.logger ?? createSilentLogger();
    this.events = options.events ?? {};
    this.liveLimit = pLimit(this.config.concurrency);
  }

  /**
   * Create the directories, start watching, process the backlog, then
   * follow live arrivals. Resolves once the backlog is done.
   */
  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error(`Pipeline cannot start from state ${this.state}`);
    }
    this.state = 'running';

    try {
      await this.ensureDirectories();

      this.buffered = [];
      const subscription = await this.watcher.watch(
        this.config.watchedPath,
        { recursive: this.config.recursive },
        (filePath) => this.onCreated(filePath),
      );
      if (!this.isRunning()) {
        // stop() ran while the watch was being registered
        await subscription.close();
        return;
      }
      this.subscription = subscription;
      this.logger.info('Watching for new files', {
        directory: this.config.watchedPath,
        recursive: this.config.recursive,
      });

      this.backlog = this.processBacklog();
      await this.backlog;
    } catch (error) {
      this.logger.error('Pipeline failed to start', { error: errorMessage(error) });
      await this.stop();
      throw error;
    }

    const arrivals = this.buffered ?? [];
    this.buffered = null;
    for (const filePath of arrivals) {
      this.schedule(filePath);
    }
  }

  /**
   * Stop watching, cancel pending settle waits and wait for ingests in
   * progress. Files whose wait was cancelled stay where they are and are
   * picked up by the next startup sweep.
   */
  stop(): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }
    if (this.state === 'idle' || this.state === 'stopped') {
      this.state = 'stopped';
      return Promise.resolve();
    }

    this.state = 'stopping';
    this.stopping = this.shutdown();
    return this.stopping;
  }

  stats(): IngestStats {
    return { ...this.counters };
  }

  /**
   * Process one file to its terminal state. Never rejects; failures are
   * reported in the outcome.
   */
  async ingest(filePath: string): Promise<IngestOutcome> {
    const file = this.relativePath(filePath);
    this.logger.info('Processing file', { file });

    // Filled in once the file has been moved to the processed area
    const placement: { destination: string | null } = { destination: null };

    let result: CommitResult;
    try {
      const content = await readFile(filePath);
      const { header, items } = extractDocument(parseDocument(content));

      result = await this.store.upsertDocument(
        header,
        items,
        { fileName: basename(filePath), originalPath: file },
        {
          beforeCommit: async () => {
            placement.destination = await this.router.placeInProcessed(filePath);
          },
        },
      );
    } catch (error) {
      return this.reject(filePath, placement.destination ?? filePath, toError(error));
    }

    const destination = placement.destination ?? filePath;
    this.counters.committed++;
    this.logger.info('File processed', {
      file,
      accessKey: result.accessKey,
      items: result.itemCount,
      replaced: result.replaced,
      destination,
    });

    const outcome: CommittedOutcome = {
      status: 'committed',
      filePath,
      accessKey: result.accessKey,
      itemCount: result.itemCount,
      destination,
    };
    this.notify(() => this.events.onCommitted?.(outcome));
    return outcome;
  }

  private async reject(filePath: string, currentPath: string, reason: Error): Promise<RejectedOutcome> {
    const file = this.relativePath(filePath);
    this.counters.rejected++;
    this.logger.error('Failed to process file', {
      file,
      error: reason.message,
      ...(reason instanceof IntakeError ? { code: reason.code } : {}),
    });

    if (currentPath !== filePath) {
      this.logger.warn('Commit failed after the file was moved; moving it to the error area', {
        file,
        from: currentPath,
      });
    }

    let destination: string | null = null;
    try {
      destination = await this.router.placeInError(currentPath);
      this.logger.info('File moved to error area', { file, destination });
    } catch (moveError) {
      this.counters.unresolved++;
      this.logger.error('Could not move file to error area', { file, error: errorMessage(moveError) });
    }

    const outcome: RejectedOutcome = { status: 'rejected', filePath, reason, destination };
    this.notify(() => this.events.onRejected?.(outcome));
    return outcome;
  }

  private async processBacklog(): Promise<void> {
    const files = await sweepBacklog(this.config.watchedPath, {
      recursive: this.config.recursive,
      extension: this.config.extension,
      exclude: [this.config.processedPath, this.config.errorPath],
    });
    this.logger.info('Processing existing files', { count: files.length });

    let processed = 0;
    for (const filePath of files) {
      if (this.abort.signal.aborted) {
        break;
      }
      if (this.inFlight.has(filePath)) {
        continue;
      }
      this.inFlight.add(filePath);
      try {
        await this.ingest(filePath);
        processed++;
      } finally {
        this.inFlight.delete(filePath);
      }
    }

    this.logger.info('Existing files processed', { count: processed });
  }

  private onCreated(filePath: string): void {
    if (this.state !== 'running') {
      return;
    }
    if (!this.accepts(filePath)) {
      this.logger.debug('Ignoring file', { path: filePath });
      return;
    }
    if (this.buffered) {
      this.buffered.push(filePath);
      return;
    }
    this.schedule(filePath);
  }

  private schedule(filePath: string): void {
    if (this.abort.signal.aborted) {
      return;
    }
    if (this.inFlight.has(filePath)) {
      this.logger.debug('File already queued', { file: this.relativePath(filePath) });
      return;
    }

    this.inFlight.add(filePath);
    const task: Promise<void> = this.handleArrival(filePath)
      .catch((error: unknown) => {
        this.logger.error('Unexpected failure handling file', {
          file: this.relativePath(filePath),
          error: errorMessage(error),
        });
      })
      .finally(() => {
        this.inFlight.delete(filePath);
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  private async handleArrival(filePath: string): Promise<void> {
    const file = this.relativePath(filePath);

    try {
      await sleep(this.config.settleMs, undefined, { signal: this.abort.signal });
    } catch (error) {
      if (isAbortError(error)) {
        this.logger.debug('Settle wait cancelled', { file });
        return;
      }
      throw error;
    }

    await this.liveLimit(async () => {
      if (this.abort.signal.aborted) {
        return;
      }
      if (!(await isFile(filePath))) {
        this.counters.vanished++;
        this.logger.debug('File no longer exists', { file });
        return;
      }
      this.logger.info('New file detected', { file });
      await this.ingest(filePath);
    });
  }

  private async shutdown(): Promise<void> {
    this.abort.abort();
    this.buffered = null;

    if (this.subscription) {
      const subscription = this.subscription;
      this.subscription = null;
      try {
        await subscription.close();
      } catch (error) {
        this.logger.warn('Failed to close watcher', { error: errorMessage(error) });
      }
    }

    await Promise.allSettled([...(this.backlog ? [this.backlog] : []), ...this.pending]);
    this.state = 'stopped';
    this.logger.info('Pipeline stopped', { ...this.counters });
  }

  private isRunning(): boolean {
    return this.state === 'running';
  }

  private async ensureDirectories(): Promise<void> {
    for (const directory of [this.config.watchedPath, this.config.processedPath, this.config.errorPath]) {
      const created = await mkdir(directory, { recursive: true });
      if (created !== undefined) {
        this.logger.info('Created directory', { directory });
      }
    }
  }

  /**
   * Extension matches, inside the watched root, outside both terminal areas.
   */
  private accepts(filePath: string): boolean {
    const absolute = resolve(filePath);
    if (extname(absolute).toLowerCase() !== this.config.extension.toLowerCase()) {
      return false;
    }
    if (!isWithin(this.config.watchedPath, absolute)) {
      return false;
    }
    if (isWithin(this.config.processedPath, absolute) || isWithin(this.config.errorPath, absolute)) {
      return false;
    }
    return this.config.recursive || !relative(this.config.watchedPath, absolute).includes(sep);
  }

  private relativePath(filePath: string): string {
    const absolute = resolve(filePath);
    return isWithin(this.config.watchedPath, absolute)
      ? relative(this.config.watchedPath, absolute)
      : basename(absolute);
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.warn('Outcome listener failed', { error: errorMessage(error) });
    }
  }
}

function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel !== '' && rel.split(sep)[0] !== '..' && !isAbsolute(rel);
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
