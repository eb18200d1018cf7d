import type { CycleMarker, Identity, JsonObject, JsonValue, RecordFields } from './record';

/**
 * Application object that can be persisted.
 * System attributes are filled in by the engine after each save or load.
 */
export interface Persistable {
  identity?: Identity;
  createdBy?: string;
  createdAt?: Date;
  modifiedBy?: string;
  modifiedAt?: Date;
  changeTag?: string;
}

/**
 * Declared kind of a model field
 */
export enum FieldKind {
  STRING = 'string',
  NUMBER = 'number',
  BOOLEAN = 'boolean',
  TIMESTAMP = 'timestamp',
  BLOB = 'blob',
  REFERENCE = 'reference',
}

/**
 * Decodes a nested object during structural decoding
 */
export interface NestedDecoder {
  decodeNested<R extends Persistable>(schema: ModelSchema<R>, tree: JsonObject): R;
}

/**
 * Explicit description of one field of a model type.
 * Replaces runtime reflection: every persisted field is declared once per type.
 */
export interface FieldDescriptor<T> {
  readonly name: string;
  readonly kind: FieldKind;
  readonly list: boolean;

  /**
   * When true, a stored record missing this field fails to decode
   */
  readonly required: boolean;

  /**
   * Schema of the referenced type (reference fields only)
   */
  target?(): ModelSchema<Persistable>;

  /**
   * Reads the current runtime value
   */
  read(object: T): unknown;

  /**
   * Converts a sanitized JSON value and assigns it to the object.
   * Throws when the JSON shape does not match the declared kind.
   */
  write(object: T, value: JsonValue, decoder: NestedDecoder): void;
}

/**
 * Custom conversion supplied by a type instead of the structural codec
 */
export interface CustomCodec<T> {
  encode(object: T): RecordFields;
  decode(tree: JsonObject): T;
}

/**
 * Per-type persistence description
 */
export interface ModelSchema<T extends Persistable> {
  /**
   * Record type name used by the store
   */
  readonly recordType: string;
  readonly fields: readonly FieldDescriptor<T>[];

  /**
   * Creates a blank instance for the structural decoder
   */
  create(): T;
  readonly codec?: CustomCodec<T>;
}

/**
 * Field enumerated from an object: name, declared kind and runtime value
 */
export interface FieldInfo {
  readonly name: string;
  readonly kind: FieldKind;
  readonly list: boolean;
  readonly value: unknown;
  readonly target?: ModelSchema<Persistable>;
}

/**
 * Enumerates the named fields of an object
 * @category Providers
 */
export interface IFieldIntrospector {
  fields<T extends Persistable>(object: T, schema: ModelSchema<T>): FieldInfo[];
}

/**
 * Value a reference field holds at runtime
 */
export type ReferenceValue<R extends Persistable> = R | CycleMarker;
