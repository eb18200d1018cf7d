import type { FieldInfo, IFieldIntrospector, ModelSchema, Persistable } from '../types/model';
import { SYSTEM_FIELD_NAMES } from '../types/record';

/**
 * Default field introspector
 * Enumerates fields from the schema's explicit descriptor list, in declaration order.
 * System attribute names are never reported.
 * @category Providers
 */
export class SchemaFieldIntrospector implements IFieldIntrospector {
  fields<T extends Persistable>(object: T, schema: ModelSchema<T>): FieldInfo[] {
    return schema.fields
      .filter(descriptor => !SYSTEM_FIELD_NAMES.includes(descriptor.name))
      .map(descriptor => ({
        name: descriptor.name,
        kind: descriptor.kind,
        list: descriptor.list,
        value: descriptor.read(object),
        target: descriptor.target?.(),
      }));
  }
}
