import type { ILogger } from '../../types/logger';

/**
 * Logger provider interface
 * @category Providers
 */
export type ILoggerProvider = ILogger;
