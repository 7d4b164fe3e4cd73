import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, type LogSink } from './logger.js';
import type { LogLevel } from '@nfe-intake/contracts';

function createCaptureSink(): LogSink & { lines: { level: LogLevel; line: string }[] } {
  const lines: { level: LogLevel; line: string }[] = [];
  return {
    lines,
    write(level, line) {
      lines.push({ level, line });
    },
  };
}

const fixedNow = (): Date => new Date('2024-05-01T12:00:00.000Z');

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format level, prefix and context', () => {
    const sink = createCaptureSink();
    const logger = createLogger({ sinks: [sink], now: fixedNow });

    logger.info('document committed', { accessKey: '123' });

    expect(sink.lines).toEqual([
      {
        level: 'info',
        line: '[2024-05-01T12:00:00.000Z] [INFO] [nfe-intake] document committed {"accessKey":"123"}',
      },
    ]);
  });

  it('should omit the context block when there is none', () => {
    const sink = createCaptureSink();
    const logger = createLogger({ sinks: [sink], now: fixedNow, prefix: 'test' });

    logger.error('boom');

    expect(sink.lines[0]?.line).toBe('[2024-05-01T12:00:00.000Z] [ERROR] [test] boom');
  });

  it('should drop messages below the minimum level', () => {
    const sink = createCaptureSink();
    const logger = createLogger({ sinks: [sink], now: fixedNow, level: 'warn' });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(sink.lines.map((l) => l.level)).toEqual(['warn']);
  });

  it('should merge child context over the parent context', () => {
    const sink = createCaptureSink();
    const logger = createLogger({ sinks: [sink], now: fixedNow, context: { run: 'r1' } });

    logger.child({ file: 'a.xml' }).warn('slow');

    expect(sink.lines[0]?.line).toBe(
      '[2024-05-01T12:00:00.000Z] [WARN] [nfe-intake] slow {"run":"r1","file":"a.xml"}',
    );
  });

  it('should keep the level in child loggers', () => {
    const sink = createCaptureSink();
    const logger = createLogger({ sinks: [sink], level: 'error' });

    logger.child({ a: 1 }).info('hidden');

    expect(sink.lines).toHaveLength(0);
  });

  it('should write each line to every sink', () => {
    const first = createCaptureSink();
    const second = createCaptureSink();
    const logger = createLogger({ sinks: [first, second], now: fixedNow });

    logger.info('twice');

    expect(first.lines).toHaveLength(1);
    expect(second.lines).toHaveLength(1);
  });

  it('should keep writing to other sinks when one throws', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const failing: LogSink = {
      write() {
        throw new Error('ENOSPC: no space left on device');
      },
    };
    const sink = createCaptureSink();
    const logger = createLogger({ sinks: [failing, sink], now: fixedNow });

    expect(() => logger.error('disk full')).not.toThrow();

    expect(sink.lines).toEqual([
      { level: 'error', line: '[2024-05-01T12:00:00.000Z] [ERROR] [nfe-intake] disk full' },
    ]);
    expect(stderr).toHaveBeenCalledWith('[nfe-intake] log sink failed: ENOSPC: no space left on device\n');
  });
});
