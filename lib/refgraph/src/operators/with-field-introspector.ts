import type { PersistenceOperator } from '../build';
import type { IFieldIntrospector } from '../types/model';

/**
 * Replaces the schema-driven field introspector
 *
 * @category Providers
 */
export function withFieldIntrospector(introspector: IFieldIntrospector): PersistenceOperator {
  return definition => ({
    ...definition,
    providers: {
      ...definition.providers,
      introspector,
    },
  });
}
