export { field, defineModel } from './field';
export type { FieldOptions } from './field';
export { SchemaFieldIntrospector } from './schema-introspector';
