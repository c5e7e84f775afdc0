import { describe, expect, test, beforeEach, vi } from 'vitest';
import { Logger } from './index';
import { ArraySink } from './sinks/array';
import type { LogEntry, LogSink } from './types';

describe('Logger', () => {
  let arraySink: ArraySink;
  let logger: Logger;

  beforeEach(() => {
    arraySink = new ArraySink();
    logger = new Logger({ sinks: [arraySink] });
  });

  describe('Basic Logging', () => {
    test('should log each level with its type', () => {
      logger.error('error line');
      logger.warn('warn line');
      logger.notice('notice line');
      logger.success('success line');
      logger.info('info line');
      logger.debug('debug line');
      logger.raw('raw line');

      expect(arraySink.getSnapshotFriendlyLogs()).toEqual([
        'error: error line',
        'warn: warn line',
        'notice: notice line',
        'success: success line',
        'info: info line',
        'debug: debug line',
        'raw: raw line',
      ]);
    });

    test('should keep params and tags on the entry', () => {
      logger.info('Component ready', {
        params: { componentName: 'config' },
        tags: ['lifecycle'],
      });

      expect(arraySink.logs[0].params).toEqual({ componentName: 'config' });
      expect(arraySink.logs[0].tags).toEqual(['lifecycle']);
    });

    test('should drop an empty tag list', () => {
      logger.info('No tags', { tags: [] });

      expect(arraySink.logs[0].tags).toBeUndefined();
    });
  });

  describe('Service and entity scoping', () => {
    test('service logger sets serviceName', () => {
      logger.service('component-registry').info('Bound');

      expect(arraySink.logs[0].serviceName).toBe('component-registry');
      expect(arraySink.logs[0].entityName).toBeUndefined();
    });

    test('entity logger sets both names', () => {
      logger.service('component-registry').entity('commands').warn('Slow');

      expect(arraySink.logs[0]).toMatchObject({
        type: 'warn',
        serviceName: 'component-registry',
        entityName: 'commands',
        message: 'Slow',
      });
    });
  });

  describe('Error objects', () => {
    test('errorObject prefixes the rendered error and keeps the original', () => {
      const error = new Error('unload failed');

      logger.service('registry').errorObject('Teardown failed', error);

      const entry = arraySink.logs[0];
      expect(entry.type).toBe('error');
      expect(entry.error).toBe(error);
      expect(entry.message.startsWith('Teardown failed: \n\nError: unload failed')).toBe(true);
    });
  });

  describe('Sinks', () => {
    test('addSink and removeSink', () => {
      const second = new ArraySink();

      logger.addSink(second);
      logger.info('both');

      expect(logger.removeSink(second)).toBe(true);
      expect(logger.removeSink(second)).toBe(false);

      logger.info('first only');

      expect(arraySink.logs).toHaveLength(2);
      expect(second.logs).toHaveLength(1);
      expect(logger.getSinks()).toEqual([arraySink]);
    });

    test('a throwing sink does not stop the others', () => {
      const onSinkError = vi.fn();
      const broken: LogSink = {
        write: (_entry: LogEntry) => {
          throw new Error('sink down');
        },
      };
      const after = new ArraySink();

      logger = new Logger({ sinks: [broken, after], onSinkError });
      logger.info('still delivered');

      expect(after.logs).toHaveLength(1);
      expect(onSinkError).toHaveBeenCalledTimes(1);
      expect(onSinkError.mock.calls[0][1]).toBe('write');
    });

    test('close stops logging and emits a close event', async () => {
      const events: unknown[] = [];
      logger.on('logger', (event) => events.push(event));

      await logger.close();
      logger.info('ignored');

      expect(logger.closed).toBe(true);
      expect(arraySink.logs).toHaveLength(0);
      expect(logger.getSinks()).toEqual([]);
      expect(events).toEqual([{ eventType: 'close' }]);
    });
  });

  test('createTestOptimizedLogger wires an ArraySink', () => {
    const { logger: testLogger, arraySink: sink, consoleSink } =
      Logger.createTestOptimizedLogger({ includeConsoleSink: true });

    testLogger.info('captured');

    expect(sink.logs).toHaveLength(1);
    expect(consoleSink?.isMuted()).toBe(true);
  });
});
