import type { LogOptions, LogType } from './types';
import type { HandleLog } from './internal-types';
import { prepareErrorObjectLog } from './utils/error-object';

/**
 * LoggerService for scoped logging with service names and, optionally, an entity
 */
export class LoggerService {
  private handleLog: HandleLog;
  private serviceName: string;
  private entityName?: string;

  constructor(handleLog: HandleLog, serviceName: string, entityName?: string) {
    this.handleLog = handleLog;
    this.serviceName = serviceName;
    this.entityName = entityName;
  }

  /**
   * Create a logger scoped to an entity of this service (e.g. one component)
   */
  public entity(entityName: string): LoggerService {
    return new LoggerService(this.handleLog, this.serviceName, entityName);
  }

  public error(message: string, options?: LogOptions): void {
    this.log('error', message, options);
  }

  /**
   * Log an error object with optional prefix
   */
  public errorObject(prefix: string, error: unknown, options?: LogOptions): void {
    this.log('error', prepareErrorObjectLog(prefix, error), options, error);
  }

  public info(message: string, options?: LogOptions): void {
    this.log('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.log('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.log('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.log('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.log('debug', message, options);
  }

  /**
   * Log a raw message without any formatting
   */
  public raw(message: string, options?: LogOptions): void {
    this.log('raw', message, options);
  }

  private log(
    type: LogType,
    message: string,
    options?: LogOptions,
    error?: unknown,
  ): void {
    this.handleLog(type, message, {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
      error,
    });
  }
}
