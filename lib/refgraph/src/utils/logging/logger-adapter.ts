import { ILogger, LogLevel } from '../../types/logger';

/**
 * Base class for external logger adapter
 */
export abstract class LoggerAdapter implements ILogger {
  protected level: LogLevel = LogLevel.INFO;

  /**
   * Sets logging level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Gets current logging level
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Checks if specified logging level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  /**
   * Logs message with specified level
   * This method must be implemented in concrete adapters
   */
  abstract log(level: LogLevel, message: string, ...args: unknown[]): void;

  /**
   * Logs debug message
   */
  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  /**
   * Logs info message
   */
  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  /**
   * Logs warning
   */
  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  /**
   * Logs error
   */
  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, ...args);
  }

  /**
   * Logs fatal error
   */
  fatal(message: string, ...args: unknown[]): void {
    this.log(LogLevel.FATAL, message, ...args);
  }
}
