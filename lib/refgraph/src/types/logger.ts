/**
 * Logging level enumeration
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  OFF = 100, // Disable all logs
}

/**
 * Logger interface
 */
export interface ILogger {
  /**
   * Sets logging level
   */
  setLevel(level: LogLevel): void;

  /**
   * Gets current logging level
   */
  getLevel(): LogLevel;

  /**
   * Checks if specified logging level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean;

  /**
   * Logs message with specified level
   * @param args Additional arguments to log
   */
  log(level: LogLevel, message: string, ...args: readonly unknown[]): void;

  debug(message: string, ...args: readonly unknown[]): void;

  info(message: string, ...args: readonly unknown[]): void;

  warn(message: string, ...args: readonly unknown[]): void;

  error(message: string, ...args: readonly unknown[]): void;

  fatal(message: string, ...args: readonly unknown[]): void;
}

/**
 * Logger that can time asynchronous operations and log them as events
 */
export interface ITimingLogger extends ILogger {
  measureTime<T>(category: string, operation: string, action: () => Promise<T>): Promise<T>;
}

export function isTimingLogger(logger: ILogger): logger is ITimingLogger {
  return 'measureTime' in logger && typeof logger.measureTime === 'function';
}
