import { format } from 'date-fns';
import type { LogEntry, LogSink, LogType } from '../types';
import { LogLevel, getLogLevel } from '../types';
import { colorize } from '../utils/color';

export interface ConsoleSinkOptions {
  colors?: boolean;
  timestamps?: boolean;
  typeLabels?: boolean;
  muted?: boolean;
  minLevel?: LogLevel;
}

type ConsoleMethod = 'error' | 'warn' | 'info' | 'log';

function consoleMethodFor(type: Exclude<LogType, 'raw'>): ConsoleMethod {
  switch (type) {
    case 'error':
      return 'error';
    case 'warn':
      return 'warn';
    case 'info':
      return 'info';
    case 'success':
    case 'notice':
    case 'debug':
      return 'log';
  }
}

/**
 * ConsoleSink writes logs to the console with optional colors, timestamps, and type labels
 */
export class ConsoleSink implements LogSink {
  private colors: boolean;
  private timestamps: boolean;
  private typeLabels: boolean;
  private closed = false;
  private muted: boolean;
  private minLevel: LogLevel;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colors = options.colors ?? true;
    this.timestamps = options.timestamps ?? false;
    this.typeLabels = options.typeLabels ?? false;
    this.muted = options.muted ?? false;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
  }

  public write(entry: LogEntry): void {
    if (this.closed || this.muted) {
      return;
    }

    // Raw type - no formatting and always shown
    if (entry.type === 'raw') {
      // eslint-disable-next-line no-console
      console.log(entry.message);
      return;
    }

    if (getLogLevel(entry.type) > this.minLevel) {
      return;
    }

    const formattedMessage = this.formatEntry(entry);
    const text = this.colors
      ? colorize(entry.type, formattedMessage)
      : formattedMessage;

    // eslint-disable-next-line no-console
    console[consoleMethodFor(entry.type)](text);
  }

  /**
   * Set the minimum log level for this sink
   */
  public setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  public getMinLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Mute the sink to stop writing logs to console
   */
  public mute(): void {
    this.muted = true;
  }

  public unmute(): void {
    this.muted = false;
  }

  public isMuted(): boolean {
    return this.muted;
  }

  /**
   * Close the sink and stop accepting new logs
   */
  public close(): void {
    this.closed = true;
  }

  private formatEntry(entry: LogEntry): string {
    let formattedMessage = '';

    if (this.timestamps) {
      formattedMessage =
        '[' + format(entry.timestamp, 'MM-dd-yyyy HH:mm:ss') + '] ';
    }

    if (this.typeLabels) {
      formattedMessage += `[${entry.type.toUpperCase()}] `;
    }

    if (entry.serviceName) {
      formattedMessage += `[${entry.serviceName}] `;
    }

    if (entry.entityName) {
      formattedMessage += `[${entry.entityName}] `;
    }

    return formattedMessage + entry.message;
  }
}
