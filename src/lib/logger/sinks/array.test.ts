import { describe, expect, test } from 'vitest';
import { ArraySink } from './array';
import type { LogEntry } from '../types';

const entry = (message: string): LogEntry => ({
  timestamp: 0,
  type: 'info',
  message,
});

describe('ArraySink', () => {
  test('stores entries in order', () => {
    const sink = new ArraySink();

    sink.write(entry('one'));
    sink.write(entry('two'));

    expect(sink.getSnapshotFriendlyLogs()).toEqual(['info: one', 'info: two']);
  });

  test('applies the transformer unless it returns false', () => {
    const sink = new ArraySink({
      transformer: (log) =>
        log.message === 'keep' ? false : { ...log, message: 'changed' },
    });

    sink.write(entry('keep'));
    sink.write(entry('rewrite'));

    expect(sink.logs.map((log) => log.message)).toEqual(['keep', 'changed']);
  });

  test('clear and close', () => {
    const sink = new ArraySink();

    sink.write(entry('one'));
    sink.clear();
    sink.close();
    sink.write(entry('two'));

    expect(sink.logs).toEqual([]);
  });
});
