import { LogLevel } from '../../types/logger';
import type { JsonValue } from '../../types/record';
import { getErrorMessage } from '../persistence-error';
import { LoggerAdapter } from './logger-adapter';

/**
 * Adapter for console logging with additional capabilities:
 * - storing log history in memory
 * - logging engine events with metadata
 * - measuring asynchronous operation time
 */
export class ConsoleLoggerAdapter extends LoggerAdapter {
  private logStorage: string[] = [];
  private maxLogSize = 100;

  log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const formattedMessage = `[${new Date().toISOString()}] ${LogLevel[level]}: ${message}`;

    /* eslint-disable no-console */
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formattedMessage, ...args);
        break;
      case LogLevel.INFO:
        console.info(formattedMessage, ...args);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage, ...args);
        break;
      case LogLevel.ERROR:
        console.error(formattedMessage, ...args);
        break;
      case LogLevel.FATAL:
        console.error(`FATAL ${formattedMessage}`, ...args);
        break;
      default:
        console.log(formattedMessage, ...args);
    }
    /* eslint-enable no-console */

    this.addToStorage(formattedMessage);
  }

  private addToStorage(message: string): void {
    this.logStorage.push(message);

    if (this.logStorage.length > this.maxLogSize) {
      this.logStorage.shift();
    }
  }

  /**
   * Sets maximum size of stored logs
   */
  setMaxLogSize(size: number): void {
    this.maxLogSize = size > 0 ? size : 100;
  }

  clear(): void {
    this.logStorage = [];
  }

  /**
   * Returns all stored log entries
   */
  getLogs(): string[] {
    return [...this.logStorage];
  }

  /**
   * Logs event with metadata
   * @param category Event category (e.g., 'save', 'load', 'cache')
   */
  logEvent(
    category: string,
    eventName: string,
    metadata?: Readonly<Record<string, JsonValue>>
  ): void {
    if (!this.isLevelEnabled(LogLevel.INFO)) {
      return;
    }

    const message = `[EVENT][${category}][${eventName}]`;
    this.log(LogLevel.INFO, metadata ? `${message} ${JSON.stringify(metadata)}` : message);
  }

  /**
   * Measures execution time of an asynchronous operation and logs the result
   */
  async measureTime<T>(category: string, operation: string, action: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      const result = await action();
      this.logEvent(category, operation, { duration: `${(performance.now() - start).toFixed(2)}ms` });
      return result;
    } catch (error) {
      this.logEvent(category, `${operation}:error`, {
        duration: `${(performance.now() - start).toFixed(2)}ms`,
        error: getErrorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Extended version of error method with error stack support
   */
  public override error(message: string, ...args: unknown[]): void {
    const errorObj = args.find((arg): arg is Error => arg instanceof Error);
    const otherArgs = args.filter(arg => !(arg instanceof Error));

    this.log(LogLevel.ERROR, errorObj ? `${message}: ${errorObj.message}` : message, ...otherArgs);

    if (errorObj?.stack) {
      this.log(LogLevel.DEBUG, `Stack: ${errorObj.stack}`);
    }
  }
}
