import type { PersistenceOperator } from '../build';
import type { ILoggerProvider } from '../providers/interfaces/logger';

/**
 * Registers a logger provider for the engine
 *
 * @category Providers
 *
 * @example
 * ```typescript
 * const engine = createPersistence(
 *   withRecordStore(store),
 *   withLoggerProvider(new ConsoleLoggerProvider({ level: LogLevel.DEBUG }))
 * );
 * ```
 */
export function withLoggerProvider(provider: ILoggerProvider): PersistenceOperator {
  return definition => ({
    ...definition,
    providers: {
      ...definition.providers,
      logger: provider,
    },
  });
}
