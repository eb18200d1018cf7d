import type { ILoggerProvider } from '../interfaces/logger';
import { ConsoleLoggerAdapter } from '../../utils/logging/console-logger-adapter';
import { LogLevel } from '../../types/logger';
import type { JsonValue } from '../../types/record';

/**
 * Console logger provider implementation
 * Wraps ConsoleLoggerAdapter and keeps its history readable
 * @category Providers
 */
export class ConsoleLoggerProvider implements ILoggerProvider {
  private readonly adapter: ConsoleLoggerAdapter;

  constructor(options: { level?: LogLevel; maxLogSize?: number } = {}) {
    this.adapter = new ConsoleLoggerAdapter();
    if (options.level !== undefined) {
      this.adapter.setLevel(options.level);
    }
    if (options.maxLogSize !== undefined) {
      this.adapter.setMaxLogSize(options.maxLogSize);
    }
  }

  setLevel(level: LogLevel): void {
    this.adapter.setLevel(level);
  }

  getLevel(): LogLevel {
    return this.adapter.getLevel();
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.adapter.isLevelEnabled(level);
  }

  log(level: LogLevel, message: string, ...args: readonly unknown[]): void {
    this.adapter.log(level, message, ...args);
  }

  debug(message: string, ...args: readonly unknown[]): void {
    this.adapter.debug(message, ...args);
  }

  info(message: string, ...args: readonly unknown[]): void {
    this.adapter.info(message, ...args);
  }

  warn(message: string, ...args: readonly unknown[]): void {
    this.adapter.warn(message, ...args);
  }

  error(message: string, ...args: readonly unknown[]): void {
    this.adapter.error(message, ...args);
  }

  fatal(message: string, ...args: readonly unknown[]): void {
    this.adapter.fatal(message, ...args);
  }

  logEvent(category: string, eventName: string, metadata?: Readonly<Record<string, JsonValue>>): void {
    this.adapter.logEvent(category, eventName, metadata);
  }

  measureTime<T>(category: string, operation: string, action: () => Promise<T>): Promise<T> {
    return this.adapter.measureTime(category, operation, action);
  }

  /**
   * Stored log lines, oldest first
   */
  getLogs(): string[] {
    return this.adapter.getLogs();
  }
}
