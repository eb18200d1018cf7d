import type { PersistenceOperator } from '../build';
import type { IRecordCacheProvider } from '../providers/interfaces/cache';

/**
 * Registers a record cache provider
 * Without one the engine builds a MemoryRecordCache from `cacheTtl` and `cacheMaxEntries`.
 *
 * @category Providers
 */
export function withCacheProvider(provider: IRecordCacheProvider): PersistenceOperator {
  return definition => ({
    ...definition,
    providers: {
      ...definition.providers,
      cache: provider,
    },
  });
}
