import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '@nfe-intake/shared';
import { loadConfig, parseConfig } from './load-config.js';

const BASE = '/srv/nfe';

describe('parseConfig', () => {
  it('should apply every default to an empty file', () => {
    const config = parseConfig('', BASE, { env: {} });

    expect(config).toEqual({
      processor: {
        watchedPath: '/srv/nfe/xml_nfe',
        processedPath: '/srv/nfe/processed',
        errorPath: '/srv/nfe/errors',
        databaseUrl: 'postgres://localhost:5432/nfe',
        recursive: true,
        extension: '.xml',
        settleMs: 1000,
        concurrency: 1,
      },
      logging: {
        level: 'info',
        directory: '/srv/nfe/logs',
        fileName: 'nfe-intake.log',
        rotation: { frequency: 'daily', backupCount: 7 },
      },
    });
  });

  it('should merge section documents and fill missing nested keys', () => {
    const source = [
      '---',
      'processor:',
      '  watchedPath: inbox',
      '  recursive: false',
      '---',
      'logging:',
      '  level: DEBUG',
      '  rotation:',
      '    frequency: hourly',
    ].join('\n');

    const config = parseConfig(source, BASE, { env: {} });

    expect(config.processor.watchedPath).toBe('/srv/nfe/inbox');
    expect(config.processor.recursive).toBe(false);
    expect(config.processor.settleMs).toBe(1000);
    expect(config.logging.level).toBe('debug');
    expect(config.logging.rotation).toEqual({ frequency: 'hourly', backupCount: 7 });
  });

  it('should keep absolute paths as given', () => {
    const config = parseConfig('processor:\n  errorPath: /var/nfe/errors\n', BASE, { env: {} });

    expect(config.processor.errorPath).toBe('/var/nfe/errors');
  });

  it('should let DATABASE_URL override the file', () => {
    const config = parseConfig('processor:\n  databaseUrl: postgres://file/nfe\n', BASE, {
      env: { DATABASE_URL: 'postgres://env/nfe' },
    });

    expect(config.processor.databaseUrl).toBe('postgres://env/nfe');
  });

  it('should ignore an empty DATABASE_URL', () => {
    const config = parseConfig('processor:\n  databaseUrl: postgres://file/nfe\n', BASE, {
      env: { DATABASE_URL: '' },
    });

    expect(config.processor.databaseUrl).toBe('postgres://file/nfe');
  });

  it('should reject invalid values with the offending path', () => {
    expect(() => parseConfig('processor:\n  concurrency: 0\n', BASE, { env: {} })).toThrow(
      /processor\.concurrency/,
    );
    expect(() => parseConfig('logging:\n  level: verbose\n', BASE, { env: {} })).toThrow(ConfigurationError);
    expect(() => parseConfig('processor:\n  extension: xml\n', BASE, { env: {} })).toThrow(ConfigurationError);
  });

  it('should reject YAML syntax errors', () => {
    expect(() => parseConfig('processor:\n  watchedPath: [unclosed\n', BASE, { env: {} })).toThrow(
      ConfigurationError,
    );
  });

  it('should reject a document that is not a mapping', () => {
    expect(() => parseConfig('- a\n- b\n', BASE, { env: {} })).toThrow('Each configuration document must be a mapping');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'nfe-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should resolve paths against the file directory', async () => {
    const file = join(dir, 'config.yaml');
    await writeFile(file, 'processor:\n  watchedPath: ./in\n');

    const config = await loadConfig(file, { env: {} });

    expect(config.processor.watchedPath).toBe(join(dir, 'in'));
    expect(config.logging.directory).toBe(join(dir, 'logs'));
  });

  it('should raise ConfigurationError for a missing file', async () => {
    await expect(loadConfig(join(dir, 'missing.yaml'), { env: {} })).rejects.toBeInstanceOf(ConfigurationError);
  });
});
