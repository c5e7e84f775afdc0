import { EventEmitter } from '../event-emitter';
import { isPromise } from '../is-promise';
import type { LogEntry, LogSink, LogType, LoggerOptions, LogOptions } from './types';
import type { HandleLogOptions } from './internal-types';
import { ArraySink } from './sinks/array';
import { ConsoleSink } from './sinks/console';
import { prepareErrorObjectLog } from './utils/error-object';
import { LoggerService } from './logger-service';

/**
 * Main Logger class with sink-based architecture and EventEmitter support
 */
export class Logger extends EventEmitter {
  private sinks: LogSink[];
  private onSinkError?: (
    error: Error,
    context: 'write' | 'close',
    sink: LogSink,
  ) => void;

  private _closed = false;

  constructor(options: LoggerOptions = {}) {
    super();

    this.sinks = options.sinks ? [...options.sinks] : [];
    this.onSinkError = options.onSinkError;
  }

  public get closed(): boolean {
    return this._closed;
  }

  public error(message: string, options?: LogOptions): void {
    this.handleLog('error', message, options);
  }

  /**
   * Log an error object with optional prefix
   */
  public errorObject(prefix: string, error: unknown, options?: LogOptions): void {
    const message = prepareErrorObjectLog(prefix, error);

    this.handleLog('error', message, { ...(options ?? {}), error });
  }

  public info(message: string, options?: LogOptions): void {
    this.handleLog('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.handleLog('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.handleLog('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.handleLog('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.handleLog('debug', message, options);
  }

  /**
   * Log a raw message without any formatting
   */
  public raw(message: string, options?: LogOptions): void {
    this.handleLog('raw', message, options);
  }

  /**
   * Create a scoped logger with a service name
   */
  public service(serviceName: string): LoggerService {
    return new LoggerService(this.handleLog.bind(this), serviceName);
  }

  public addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  /**
   * Remove a sink from the logger
   * Returns true if the sink was found and removed, false otherwise
   */
  public removeSink(sink: LogSink): boolean {
    const index = this.sinks.indexOf(sink);

    if (index !== -1) {
      this.sinks.splice(index, 1);
      return true;
    }

    return false;
  }

  /**
   * Get a readonly copy of the current sinks
   */
  public getSinks(): readonly LogSink[] {
    return [...this.sinks];
  }

  /**
   * Close all sinks and cleanup resources
   * After closing, the logger is marked as closed and all sinks are removed
   */
  public async close(): Promise<void> {
    this._closed = true;

    await Promise.all(
      this.sinks.map(async (sink) => {
        if (sink.close) {
          try {
            await sink.close();
          } catch (error) {
            this.handleSinkError(error, 'close', sink);
          }
        }
      }),
    );

    this.sinks = [];

    this.emit('logger', { eventType: 'close' });
  }

  /**
   * Create a logger optimized for testing.
   * Includes an ArraySink by default for easy log inspection.
   */
  public static createTestOptimizedLogger(options?: {
    sinks?: LogSink[];
    includeConsoleSink?: boolean;
    muteConsole?: boolean;
  }): { logger: Logger; arraySink: ArraySink; consoleSink?: ConsoleSink } {
    const arraySink = new ArraySink();

    const consoleSink = options?.includeConsoleSink
      ? new ConsoleSink({ muted: options.muteConsole ?? true })
      : undefined;

    const sinks: LogSink[] = [arraySink];

    if (consoleSink) {
      sinks.push(consoleSink);
    }

    sinks.push(...(options?.sinks ?? []));

    return {
      logger: new Logger({ sinks }),
      arraySink,
      consoleSink,
    };
  }

  /**
   * Internal method to handle all log operations
   */
  protected handleLog(
    type: LogType,
    message: string,
    options?: HandleLogOptions,
  ): void {
    if (this._closed) {
      return;
    }

    const timestamp = Date.now();
    const tags = options?.tags;

    const entry: LogEntry = {
      timestamp,
      type,
      serviceName: options?.serviceName?.trim() || undefined,
      entityName: options?.entityName?.trim() || undefined,
      message,
      params: options?.params,
      error: options?.error,
      tags: tags && tags.length > 0 ? tags : undefined,
    };

    for (const sink of this.sinks) {
      try {
        const result = sink.write(entry);

        // Handle async errors from sinks that return promises
        if (isPromise(result)) {
          result.catch((error: unknown) => {
            this.handleSinkError(error, 'write', sink);
          });
        }
      } catch (error) {
        this.handleSinkError(error, 'write', sink);
      }
    }

    this.emit('logger', {
      eventType: 'log',
      logType: type,
      message,
      timestamp,
    });
  }

  /**
   * Handle sink errors by calling the onSinkError callback or falling back to console.error
   */
  private handleSinkError(
    error: unknown,
    context: 'write' | 'close',
    sink: LogSink,
  ): void {
    const sinkError = error instanceof Error ? error : new Error(String(error));

    if (this.onSinkError) {
      this.onSinkError(sinkError, context, sink);
      return;
    }

    // eslint-disable-next-line no-console
    console.error(
      `Error ${context === 'write' ? 'writing to' : 'closing'} sink: ${sinkError.message}`,
    );
  }
}

// Re-export types and sinks
export * from './types';
export * from './sinks';
export { LoggerService } from './logger-service';
