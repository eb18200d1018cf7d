import type { PersistenceOperator } from '../build';
import type { IRecordStore } from '../providers/interfaces/record-store';

/**
 * Registers the backing record store. Required.
 *
 * @category Providers
 */
export function withRecordStore(store: IRecordStore): PersistenceOperator {
  return definition => ({
    ...definition,
    providers: {
      ...definition.providers,
      store,
    },
  });
}
