import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { ConsoleSink } from './console';
import type { LogEntry } from '../types';
import { LogLevel } from '../types';

describe('ConsoleSink', () => {
  let logSpy: MockInstance;
  let errorSpy: MockInstance;
  let warnSpy: MockInstance;
  let infoSpy: MockInstance;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const entry = (overrides: Partial<LogEntry>): LogEntry => ({
    timestamp: Date.now(),
    type: 'info',
    message: 'Test message',
    ...overrides,
  });

  test('prefixes service and entity names', () => {
    const sink = new ConsoleSink({ colors: false });

    sink.write(
      entry({ serviceName: 'component-registry', entityName: 'config' }),
    );

    expect(infoSpy).toHaveBeenCalledWith(
      '[component-registry] [config] Test message',
    );
  });

  test('routes each type to its console method', () => {
    const sink = new ConsoleSink({ colors: false, minLevel: LogLevel.DEBUG });

    sink.write(entry({ type: 'error', message: 'e' }));
    sink.write(entry({ type: 'warn', message: 'w' }));
    sink.write(entry({ type: 'success', message: 's' }));
    sink.write(entry({ type: 'debug', message: 'd' }));

    expect(errorSpy).toHaveBeenCalledWith('e');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(logSpy.mock.calls).toEqual([['s'], ['d']]);
  });

  test('adds type labels', () => {
    const sink = new ConsoleSink({ colors: false, typeLabels: true });

    sink.write(entry({ type: 'warn', message: 'careful' }));

    expect(warnSpy).toHaveBeenCalledWith('[WARN] careful');
  });

  test('formats timestamps', () => {
    const sink = new ConsoleSink({ colors: false, timestamps: true });

    sink.write(entry({ timestamp: new Date(2024, 0, 2, 3, 4, 5).getTime() }));

    expect(infoSpy).toHaveBeenCalledWith('[01-02-2024 03:04:05] Test message');
  });

  test('filters below the minimum level but always prints raw', () => {
    const sink = new ConsoleSink({ colors: false });

    sink.write(entry({ type: 'debug', message: 'hidden' }));
    sink.write(entry({ type: 'raw', message: 'shown' }));

    expect(logSpy.mock.calls).toEqual([['shown']]);
  });

  test('colored output still contains the message', () => {
    const sink = new ConsoleSink();

    sink.write(entry({ type: 'error', message: 'colored' }));

    expect(String(errorSpy.mock.calls[0][0])).toContain('colored');
  });

  test('mute, unmute and close', () => {
    const sink = new ConsoleSink({ colors: false });

    sink.mute();
    sink.write(entry({ message: 'muted' }));
    expect(sink.isMuted()).toBe(true);

    sink.unmute();
    sink.write(entry({ message: 'audible' }));

    sink.close();
    sink.write(entry({ message: 'closed' }));

    expect(infoSpy.mock.calls).toEqual([['audible']]);
  });
});
