/**
 * @nfe-intake/ingest
 *
 * Watched-folder ingestion: backlog sweep, live watch, routing of source
 * files and the configuration loader.
 *
 * @packageDocumentation
 */

export {
  IngestPipeline,
  type IngestPipelineOptions,
  type PipelineSettings,
} from './pipeline/pipeline.js';
export { FileRouter, uniqueDestination, type DocumentRouter, type FileRouterOptions } from './router/file-router.js';
export { sweepBacklog, type SweepOptions } from './sweep/backlog-sweep.js';
export { ChokidarWatchAdapter, type ChokidarWatchAdapterOptions } from './watch/chokidar-watcher.js';
export { loadConfig, parseConfig, DEFAULT_CONFIG_FILE, type LoadConfigOptions } from './config/load-config.js';
