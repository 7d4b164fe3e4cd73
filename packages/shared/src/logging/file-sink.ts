import { appendFileSync, existsSync, mkdirSync, readdirSync, renameSync, rmSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { RotationFrequency } from '@nfe-intake/contracts';
import type { LogSink } from './logger.js';

export interface FileSinkOptions {
  directory: string;
  fileName: string;
  frequency: RotationFrequency;
  /** Rotated files kept besides the active one */
  backupCount: number;
  now?: () => Date;
}

/**
 * Period label for a timestamp: `2024-05-01` (daily) or `2024-05-01_13` (hourly),
 * in local time.
 */
export function rotationPeriod(date: Date, frequency: RotationFrequency): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  return frequency === 'hourly' ? `${day}_${pad(date.getHours())}` : day;
}

/**
 * Appends lines to `<directory>/<fileName>`.
 *
 * When the period changes, the active file is renamed to
 * `<fileName>.<period>` and rotated files beyond `backupCount` are removed,
 * oldest first.
 */
export function createFileSink(options: FileSinkOptions): LogSink {
  const now = options.now ?? (() => new Date());
  const activePath = join(options.directory, options.fileName);

  mkdirSync(options.directory, { recursive: true });

  // A file left by an earlier run belongs to the period it was last written in
  let currentPeriod = rotationPeriod(
    existsSync(activePath) ? statSync(activePath).mtime : now(),
    options.frequency,
  );

  const prune = (): void => {
    const rotated = readdirSync(options.directory)
      .filter((name) => name.startsWith(`${options.fileName}.`))
      .sort();
    const excess = rotated.length - options.backupCount;
    for (const name of rotated.slice(0, Math.max(0, excess))) {
      rmSync(join(options.directory, name), { force: true });
    }
  };

  const rotate = (nextPeriod: string): void => {
    if (existsSync(activePath)) {
      renameSync(activePath, `${activePath}.${currentPeriod}`);
    }
    currentPeriod = nextPeriod;
    prune();
  };

  return {
    write(_level, line) {
      const period = rotationPeriod(now(), options.frequency);
      if (period !== currentPeriod) {
        rotate(period);
      }
      appendFileSync(activePath, `${line}\n`, 'utf-8');
    },
  };
}
