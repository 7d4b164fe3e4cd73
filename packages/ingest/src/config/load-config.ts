/**
 * Configuration Loader
 *
 * Loads and validates the intake configuration from a YAML file. The file may
 * hold several documents (e.g. one per section); they are merged in order.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { LOG_LEVELS, type IntakeConfig } from '@nfe-intake/contracts';
import { ConfigurationError, errorMessage } from '@nfe-intake/shared';

export const DEFAULT_CONFIG_FILE = 'config.yaml';

const ProcessorSchema = z
  .object({
    watchedPath: z.string().min(1).default('./xml_nfe'),
    processedPath: z.string().min(1).default('./processed'),
    errorPath: z.string().min(1).default('./errors'),
    databaseUrl: z.string().min(1).default('postgres://localhost:5432/nfe'),
    recursive: z.boolean().default(true),
    extension: z
      .string()
      .regex(/^\.[^./\\]+$/, 'must look like ".xml"')
      .default('.xml'),
    settleMs: z.number().int().min(0).default(1000),
    concurrency: z.number().int().min(1).default(1),
  })
  .default({});

const LoggingSchema = z
  .object({
    level: z
      .string()
      .transform((level) => level.toLowerCase())
      .pipe(z.enum(LOG_LEVELS))
      .default('info'),
    directory: z.string().min(1).default('./logs'),
    fileName: z.string().min(1).default('nfe-intake.log'),
    rotation: z
      .object({
        frequency: z.enum(['daily', 'hourly']).default('daily'),
        backupCount: z.number().int().min(0).default(7),
      })
      .default({}),
  })
  .default({});

const IntakeConfigSchema = z.object({
  processor: ProcessorSchema,
  logging: LoggingSchema,
});

export interface LoadConfigOptions {
  /** Environment consulted for overrides (defaults to `process.env`) */
  env?: Record<string, string | undefined>;
}

/**
 * Load configuration from a YAML file. Relative paths resolve against the
 * file's directory.
 */
export async function loadConfig(configPath: string, options: LoadConfigOptions = {}): Promise<IntakeConfig> {
  const absolutePath = resolve(configPath);

  let source: string;
  try {
    source = await readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${absolutePath}: ${errorMessage(error)}`,
      { configPath: absolutePath },
      error,
    );
  }

  return parseConfig(source, dirname(absolutePath), options);
}

/**
 * Parse configuration text; `baseDir` anchors relative paths.
 */
export function parseConfig(source: string, baseDir: string, options: LoadConfigOptions = {}): IntakeConfig {
  const env = options.env ?? process.env;
  const merged = mergeDocuments(source);

  const result = IntakeConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const { processor, logging } = result.data;
  const databaseUrl = env['DATABASE_URL'];

  return {
    processor: {
      ...processor,
      watchedPath: resolve(baseDir, processor.watchedPath),
      processedPath: resolve(baseDir, processor.processedPath),
      errorPath: resolve(baseDir, processor.errorPath),
      databaseUrl: databaseUrl !== undefined && databaseUrl !== '' ? databaseUrl : processor.databaseUrl,
    },
    logging: {
      ...logging,
      directory: resolve(baseDir, logging.directory),
    },
  };
}

function mergeDocuments(source: string): Record<string, unknown> {
  const merged: Record<string, unknown> = {};

  for (const document of YAML.parseAllDocuments(source)) {
    const firstError = document.errors[0];
    if (firstError) {
      throw new ConfigurationError(`Invalid YAML: ${firstError.message}`, { code: firstError.code });
    }

    const value: unknown = document.toJS();
    if (value === null || value === undefined) {
      continue;
    }
    if (!isRecord(value)) {
      throw new ConfigurationError('Each configuration document must be a mapping');
    }
    Object.assign(merged, value);
  }

  return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
