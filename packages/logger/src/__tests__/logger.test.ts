/* eslint-disable @typescript-eslint/no-empty-function -- acceptable in tests */
import { Writable } from 'node:stream';

import { beforeEach, describe, expect, it, vi } from 'vitest';

import { flushLoggers, getLogger, initLogger, type LogEntry, type Sink } from '../logger.js';
import { ConsoleSink } from '../sinks/console.js';

function createMemorySink(): Sink & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    write: (entry: LogEntry) => entries.push(entry),
    flush: () => {},
  };
}

function createCapturingStream(): { lines: string[]; stream: Writable } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
  return { lines, stream };
}

describe('Logger', () => {
  beforeEach(() => {
    initLogger({ sinks: [] });
  });

  it('should be silent when no sinks are configured', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = getLogger('silent');

    logger.info('nothing to see');
    logger.error('still nothing');
    flushLoggers();

    expect(stderrSpy).not.toHaveBeenCalled();
    stderrSpy.mockRestore();
  });

  it('should write entries to the configured sink', () => {
    const sink = createMemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('converter').info('converted address');

    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]?.level).toBe('info');
    expect(sink.entries[0]?.category).toBe('converter');
    expect(sink.entries[0]?.msg).toBe('converted address');
    expect(sink.entries[0]?.context).toBeUndefined();
  });

  it('should drop entries below the configured level', () => {
    const sink = createMemorySink();
    initLogger({ level: 'warn', sinks: [sink] });
    const logger = getLogger('levels');

    logger.trace('trace message');
    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(sink.entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
  });

  it('should apply a later initLogger call to loggers created earlier', () => {
    const logger = getLogger('early');
    const sink = createMemorySink();

    initLogger({ level: 'debug', sinks: [sink] });
    logger.debug('after init');

    expect(sink.entries).toHaveLength(1);
  });

  it('should return the same logger for the same category', () => {
    expect(getLogger('batch')).toBe(getLogger('batch'));
  });

  it('should attach serialized context', () => {
    const sink = createMemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('ctx').info({ address: 'inj1test', count: 2 }, 'batch entry');

    expect(sink.entries[0]?.msg).toBe('batch entry');
    expect(sink.entries[0]?.context).toEqual({ address: 'inj1test', count: 2 });
  });

  it('should serialize errors, bigints and byte arrays in context', () => {
    const sink = createMemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('ctx').error(
      { error: new Error('decode failed'), nonce: 10n, bytes: new Uint8Array([0, 171, 255]) },
      'conversion failed'
    );

    const context = sink.entries[0]?.context;
    expect(context?.['error']).toMatchObject({ name: 'Error', message: 'decode failed' });
    expect(context?.['nonce']).toBe('10');
    expect(context?.['bytes']).toBe('00abff');
  });

  it('should replace circular references', () => {
    const sink = createMemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    const obj: Record<string, unknown> = { name: 'loop' };
    obj['self'] = obj;
    getLogger('ctx').info({ data: obj }, 'circular');

    expect(sink.entries[0]?.context?.['data']).toEqual({ name: 'loop', self: '[Circular]' });
  });

  it('should keep an object that appears under two keys', () => {
    const sink = createMemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    const chain = { prefix: 'osmo' };
    getLogger('ctx').info({ source: chain, target: chain }, 'shared');

    expect(sink.entries[0]?.context).toEqual({ source: { prefix: 'osmo' }, target: { prefix: 'osmo' } });
  });

  it('should drop undefined values and format dates as ISO strings', () => {
    const sink = createMemorySink();
    initLogger({ level: 'info', sinks: [sink] });

    getLogger('ctx').info({ file: undefined, at: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) }, 'dated');

    expect(sink.entries[0]?.context).toEqual({ at: '2024-01-02T03:04:05.000Z' });
  });

  it('should flush every configured sink', () => {
    const flush = vi.fn();
    initLogger({ sinks: [{ write: () => {}, flush }, { write: () => {}, flush }] });

    flushLoggers();

    expect(flush).toHaveBeenCalledTimes(2);
  });
});

describe('ConsoleSink', () => {
  it('should format entries as a single line', () => {
    const { lines, stream } = createCapturingStream();
    const sink = new ConsoleSink({ stream });

    sink.write({
      level: 'info',
      category: 'cli',
      timestamp: new Date(2024, 0, 1, 12, 5, 9),
      msg: 'converted',
      context: { prefix: 'osmo' },
    });
    sink.flush();

    expect(lines).toEqual(['[12:05:09] INFO  [cli] converted {prefix="osmo"}\n']);
  });

  it('should wrap the level in ANSI colour codes when enabled', () => {
    const { lines, stream } = createCapturingStream();
    const sink = new ConsoleSink({ stream, color: true });

    sink.write({ level: 'error', category: 'cli', timestamp: new Date(2024, 0, 1, 8, 0, 0), msg: 'failed' });
    sink.flush();

    expect(lines).toEqual(['[08:00:00] \x1b[31mERROR\x1b[0m [cli] failed\n']);
  });

  it('should default to stderr', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const sink = new ConsoleSink();

    sink.write({ level: 'warn', category: 'cli', timestamp: new Date(), msg: 'to stderr' });
    sink.flush();

    expect(stderrSpy).toHaveBeenCalledWith(expect.stringContaining('WARN  [cli] to stderr'));
    stderrSpy.mockRestore();
  });

  it('should hold lines until flushed and write them as one chunk', () => {
    const { lines, stream } = createCapturingStream();
    const sink = new ConsoleSink({ stream });

    sink.write({ level: 'info', category: 'batch', timestamp: new Date(2024, 0, 1, 9, 0, 0), msg: 'first' });
    sink.write({ level: 'warn', category: 'batch', timestamp: new Date(2024, 0, 1, 9, 0, 1), msg: 'second' });
    expect(lines).toEqual([]);

    sink.flush();
    expect(lines).toEqual(['[09:00:00] INFO  [batch] first\n[09:00:01] WARN  [batch] second\n']);
  });

  it('should write immediately once maxPending lines are held', () => {
    const { lines, stream } = createCapturingStream();
    const sink = new ConsoleSink({ stream, maxPending: 2 });

    sink.write({ level: 'debug', category: 'batch', timestamp: new Date(2024, 0, 1, 9, 0, 0), msg: 'a' });
    expect(lines).toHaveLength(0);
    sink.write({ level: 'debug', category: 'batch', timestamp: new Date(2024, 0, 1, 9, 0, 0), msg: 'b' });

    expect(lines).toEqual(['[09:00:00] DEBUG [batch] a\n[09:00:00] DEBUG [batch] b\n']);
  });

  it('should write error entries without waiting for a flush', () => {
    const { lines, stream } = createCapturingStream();
    const sink = new ConsoleSink({ stream });

    sink.write({ level: 'info', category: 'cli', timestamp: new Date(2024, 0, 1, 9, 0, 0), msg: 'before' });
    sink.write({ level: 'error', category: 'cli', timestamp: new Date(2024, 0, 1, 9, 0, 0), msg: 'failed' });

    expect(lines).toEqual(['[09:00:00] INFO  [cli] before\n[09:00:00] ERROR [cli] failed\n']);
  });

  it('should write nothing when flushed empty', () => {
    const { lines, stream } = createCapturingStream();

    new ConsoleSink({ stream }).flush();

    expect(lines).toEqual([]);
  });
});
