import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readdirSync, readFileSync, rmSync, utimesSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createFileSink, rotationPeriod } from './file-sink.js';

describe('rotationPeriod', () => {
  it('should label days and hours in local time', () => {
    const date = new Date(2024, 0, 5, 7, 30);

    expect(rotationPeriod(date, 'daily')).toBe('2024-01-05');
    expect(rotationPeriod(date, 'hourly')).toBe('2024-01-05_07');
  });
});

describe('createFileSink', () => {
  let dir: string;
  let current: Date;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'nfe-log-'));
    current = new Date(2024, 4, 1, 10, 0);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should append lines to the active file', () => {
    const sink = createFileSink({ directory: dir, fileName: 'nfe.log', frequency: 'daily', backupCount: 3, now: () => current });

    sink.write('info', 'first');
    sink.write('error', 'second');

    expect(readFileSync(join(dir, 'nfe.log'), 'utf-8')).toBe('first\nsecond\n');
  });

  it('should rotate when the day changes', () => {
    const sink = createFileSink({ directory: dir, fileName: 'nfe.log', frequency: 'daily', backupCount: 3, now: () => current });

    sink.write('info', 'day one');
    current = new Date(2024, 4, 2, 9, 0);
    sink.write('info', 'day two');

    expect(readFileSync(join(dir, 'nfe.log.2024-05-01'), 'utf-8')).toBe('day one\n');
    expect(readFileSync(join(dir, 'nfe.log'), 'utf-8')).toBe('day two\n');
  });

  it('should rotate a file left from an earlier day on the first write', () => {
    const active = join(dir, 'nfe.log');
    writeFileSync(active, 'last run\n');
    const lastWrite = new Date(2024, 3, 28, 18, 0);
    utimesSync(active, lastWrite, lastWrite);

    const sink = createFileSink({ directory: dir, fileName: 'nfe.log', frequency: 'daily', backupCount: 3, now: () => current });
    sink.write('info', 'this run');

    expect(readFileSync(join(dir, 'nfe.log.2024-04-28'), 'utf-8')).toBe('last run\n');
    expect(readFileSync(active, 'utf-8')).toBe('this run\n');
  });

  it('should keep appending to a file from the current day', () => {
    const active = join(dir, 'nfe.log');
    writeFileSync(active, 'earlier today\n');
    const lastWrite = new Date(2024, 4, 1, 8, 0);
    utimesSync(active, lastWrite, lastWrite);

    const sink = createFileSink({ directory: dir, fileName: 'nfe.log', frequency: 'daily', backupCount: 3, now: () => current });
    sink.write('info', 'later');

    expect(readdirSync(dir)).toEqual(['nfe.log']);
    expect(readFileSync(active, 'utf-8')).toBe('earlier today\nlater\n');
  });

  it('should keep only backupCount rotated files', () => {
    const sink = createFileSink({ directory: dir, fileName: 'nfe.log', frequency: 'daily', backupCount: 1, now: () => current });

    sink.write('info', 'one');
    current = new Date(2024, 4, 2, 9, 0);
    sink.write('info', 'two');
    current = new Date(2024, 4, 3, 9, 0);
    sink.write('info', 'three');

    expect(readdirSync(dir).sort()).toEqual(['nfe.log', 'nfe.log.2024-05-02']);
  });

  it('should create the log directory', () => {
    const nested = join(dir, 'a', 'b');
    const sink = createFileSink({ directory: nested, fileName: 'x.log', frequency: 'hourly', backupCount: 1, now: () => current });

    sink.write('info', 'line');

    expect(readFileSync(join(nested, 'x.log'), 'utf-8')).toBe('line\n');
  });
});
