/**
 * Filesystem watch capability consumed by the ingestion pipeline.
 */

/**
 * Receives creation notifications. Implementations must not throw; the
 * adapter does not await the returned promise beyond logging a rejection.
 */
export type CreatedFileHandler = (filePath: string) => void | Promise<void>;

export interface WatchOptions {
  /** Watch subdirectories of the root as well */
  recursive: boolean;
}

/**
 * An active watch. `close()` stops delivery of further notifications.
 */
export interface WatchSubscription {
  close(): Promise<void>;
}

/**
 * Supplies a live stream of file-creation events for a directory tree.
 */
export interface FileWatchAdapter {
  /**
   * Start watching `root`. Resolves once the watch is established, so any
   * file created after resolution is reported.
   */
  watch(root: string, options: WatchOptions, onCreated: CreatedFileHandler): Promise<WatchSubscription>;
}
