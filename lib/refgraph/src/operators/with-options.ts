import type { PersistenceOperator } from '../build';
import type { PersistenceOptions } from '../types/persistence-options';

/**
 * Sets engine options. Later calls override earlier ones key by key.
 *
 * @throws Error if options is not an object
 *
 * @example
 * ```typescript
 * const engine = createPersistence(
 *   withRecordStore(store),
 *   withOptions({
 *     cacheTtl: 10,
 *     danglingReferencePolicy: 'skip',
 *     identifierStrategy: { kind: 'generator', generate: type => `${type}-${nextId()}` },
 *   })
 * );
 * ```
 */
export function withOptions(options: PersistenceOptions): PersistenceOperator {
  if (!options || typeof options !== 'object') {
    throw new Error('withOptions: options must be an object');
  }

  return definition => ({
    ...definition,
    options: {
      ...definition.options,
      ...options,
    },
  });
}
