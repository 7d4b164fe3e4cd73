import type { LogLevel } from '../logging/log-level.js';

/**
 * Processor settings with every path resolved to an absolute path.
 */
export interface ProcessorConfig {
  watchedPath: string;
  processedPath: string;
  errorPath: string;
  /** PostgreSQL connection string */
  databaseUrl: string;
  recursive: boolean;
  /** Recognized file extension including the dot, matched case-insensitively */
  extension: string;
  /** Wait before reading a newly created file */
  settleMs: number;
  /** Maximum number of live ingests running at once */
  concurrency: number;
}

export type RotationFrequency = 'daily' | 'hourly';

export interface LoggingConfig {
  level: LogLevel;
  /** Absolute directory for log files */
  directory: string;
  fileName: string;
  rotation: {
    frequency: RotationFrequency;
    backupCount: number;
  };
}

export interface IntakeConfig {
  processor: ProcessorConfig;
  logging: LoggingConfig;
}
