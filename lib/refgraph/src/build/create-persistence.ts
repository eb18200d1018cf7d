import { PersistenceEngine } from '../engine/persistence-engine';
import type { PersistenceDefinition, PersistenceOperator } from './operator-types';

/**
 * Creates a persistence engine from operators
 *
 * @example
 * ```typescript
 * const engine = createPersistence(
 *   withRecordStore(new MemoryRecordStore()),
 *   withOptions({ cacheTtl: 60, identifierStrategy: { kind: 'uuid' } }),
 *   withLoggerProvider(new ConsoleLoggerProvider({ level: LogLevel.WARN }))
 * );
 *
 * const authors = engine.repository(AuthorSchema);
 * const saved = await authors.save(author);
 * const loaded = await authors.load(saved.identity);
 * ```
 */
export function createPersistence(...operators: readonly PersistenceOperator[]): PersistenceEngine {
  let definition: PersistenceDefinition = {
    providers: {},
    options: {},
  };

  for (const operator of operators) {
    definition = operator(definition);
  }

  return new PersistenceEngine(definition);
}
