import type {
  FieldInfo,
  ModelSchema,
  NestedDecoder,
  Persistable,
} from '../types/model';
import { FieldKind } from '../types/model';
import type {
  CycleMarker,
  JsonObject,
  JsonValue,
  Primitive,
  RecordValue,
  StoredRecord,
} from '../types/record';
import { createAsset, isAssetHandle, isCycleMarker, isRecordReference } from '../types/record';
import {
  MappingError,
  UnsupportedFieldTypeError,
  getErrorMessage,
} from '../utils/persistence-error';
import { bytesToBase64 } from './base64';

/**
 * Runtime value of a reference field: an object to persist,
 * or a marker left by a previous load
 */
export type ReferenceTarget = Persistable | CycleMarker;

/**
 * Result of classifying a field value
 */
export type FieldClassification =
  | { readonly kind: 'absent' }
  | { readonly kind: 'primitive'; readonly value: Primitive }
  | { readonly kind: 'primitiveList'; readonly value: readonly Primitive[] }
  | { readonly kind: 'blob'; readonly value: Uint8Array }
  | { readonly kind: 'blobList'; readonly value: readonly Uint8Array[] }
  | {
      readonly kind: 'reference';
      readonly value: ReferenceTarget;
      readonly target: ModelSchema<Persistable>;
    }
  | {
      readonly kind: 'referenceList';
      readonly value: readonly ReferenceTarget[];
      readonly target: ModelSchema<Persistable>;
    };

const ABSENT: FieldClassification = { kind: 'absent' };

/**
 * Describes the runtime kind of a value for error messages
 */
export function describeKind(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'Date';
  if (value instanceof Uint8Array) return 'Uint8Array';
  if (value instanceof Map) return 'Map';
  if (value instanceof Set) return 'Set';
  if (typeof value === 'number' && !Number.isFinite(value)) return 'non-finite number';
  if (typeof value === 'object') {
    const name: unknown = value.constructor?.name;
    return typeof name === 'string' && name !== 'Object' ? name : 'object';
  }
  return typeof value;
}

function isPrimitiveOfKind(kind: FieldKind, value: unknown): value is Primitive {
  switch (kind) {
    case FieldKind.STRING:
      return typeof value === 'string';
    case FieldKind.NUMBER:
      return typeof value === 'number' && Number.isFinite(value);
    case FieldKind.BOOLEAN:
      return typeof value === 'boolean';
    case FieldKind.TIMESTAMP:
      return value instanceof Date && !Number.isNaN(value.getTime());
    default:
      return false;
  }
}

/**
 * True for values that can stand at the other end of a reference edge
 */
export function isReferenceTarget(value: unknown): value is ReferenceTarget {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof Map) &&
    !(value instanceof Set)
  );
}

function isBytes(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array;
}

/**
 * Converts leaf field values between the object and record representations
 *
 * Nested objects are classified but never resolved here: reference edges
 * belong to the save and load pipelines.
 */
export class RecordCodec implements NestedDecoder {
  /**
   * Classifies a field from its declared kind and runtime value
   * @throws UnsupportedFieldTypeError when the value matches no supported kind
   */
  classify(info: FieldInfo, typeName?: string): FieldClassification {
    const { name, kind, list, value } = info;

    if (value === undefined || value === null) {
      return ABSENT;
    }

    if (list) {
      if (!Array.isArray(value)) {
        throw new UnsupportedFieldTypeError(name, describeKind(value), typeName);
      }
      const items: readonly unknown[] = value;

      if (kind === FieldKind.REFERENCE) {
        if (info.target && items.every(isReferenceTarget)) {
          return { kind: 'referenceList', value: items, target: info.target };
        }
      } else if (kind === FieldKind.BLOB) {
        if (items.every(isBytes)) {
          return { kind: 'blobList', value: items };
        }
      } else if (items.every((item): item is Primitive => isPrimitiveOfKind(kind, item))) {
        return { kind: 'primitiveList', value: items };
      }

      const kinds = Array.from(new Set(items.map(describeKind)));
      throw new UnsupportedFieldTypeError(name, `array<${kinds.join('|')}>`, typeName);
    }

    if (kind === FieldKind.REFERENCE) {
      if (info.target && isReferenceTarget(value)) {
        return { kind: 'reference', value, target: info.target };
      }
    } else if (kind === FieldKind.BLOB) {
      if (isBytes(value)) {
        return { kind: 'blob', value };
      }
    } else if (isPrimitiveOfKind(kind, value)) {
      return { kind: 'primitive', value };
    }

    throw new UnsupportedFieldTypeError(name, describeKind(value), typeName);
  }

  /**
   * Converts a classified leaf into its record value.
   * Returns undefined for absent values and for references.
   */
  encodeLeaf(classification: FieldClassification): RecordValue | undefined {
    switch (classification.kind) {
      case 'primitive':
        return classification.value;
      case 'primitiveList':
        return [...classification.value];
      case 'blob':
        return createAsset(classification.value);
      case 'blobList':
        return classification.value.map(createAsset);
      default:
        return undefined;
    }
  }

  /**
   * Decodes a sanitized tree into an object of the schema's type
   * @throws MappingError on shape mismatch
   */
  decode<T extends Persistable>(schema: ModelSchema<T>, tree: JsonObject): T {
    if (schema.codec) {
      try {
        return schema.codec.decode(tree);
      } catch (error) {
        if (error instanceof MappingError) throw error;
        throw new MappingError(schema.recordType, getErrorMessage(error), undefined, error);
      }
    }

    const object = schema.create();
    assignSystemFieldsFromTree(object, tree, schema.recordType);

    for (const descriptor of schema.fields) {
      const value = tree[descriptor.name];
      if (value === undefined || value === null) {
        if (descriptor.required) {
          throw new MappingError(schema.recordType, 'missing required value', descriptor.name);
        }
        continue;
      }
      try {
        descriptor.write(object, value, this);
      } catch (error) {
        throw new MappingError(schema.recordType, getErrorMessage(error), descriptor.name, error);
      }
    }

    return object;
  }

  decodeNested<R extends Persistable>(schema: ModelSchema<R>, tree: JsonObject): R {
    return this.decode(schema, tree);
  }
}

/**
 * Converts a value into its JSON-safe form.
 * Returns undefined for values that are dropped (null, undefined).
 */
export function sanitizeValue(value: unknown): JsonValue | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : String(value);
  }
  if (value instanceof Date) {
    return value.getTime();
  }
  if (value instanceof Uint8Array) {
    return bytesToBase64(value);
  }
  if (isAssetHandle(value)) {
    return bytesToBase64(value.data);
  }
  if (isRecordReference(value)) {
    return { identity: value.identity };
  }
  if (isCycleMarker(value)) {
    return { identity: value.identity, isCycle: true };
  }
  if (Array.isArray(value)) {
    const items: readonly unknown[] = value;
    return items.map(item => sanitizeValue(item) ?? null);
  }
  if (typeof value === 'object') {
    return sanitizeMap(Object.entries(value));
  }
  return String(value);
}

function sanitizeMap(entries: ReadonlyArray<readonly [string, unknown]>): JsonObject {
  const sanitized: JsonObject = {};
  for (const [key, value] of entries) {
    const json = sanitizeValue(value);
    if (json !== undefined) {
      sanitized[key] = json;
    }
  }
  return sanitized;
}

/**
 * Renders a record in its wire shape:
 * `{identity, createdBy, createdAt, modifiedBy, modifiedAt, changeTag, ...fields}`
 */
export function toWire(record: StoredRecord): JsonObject {
  return sanitizeMap([
    ['identity', record.identity],
    ['createdBy', record.system.createdBy],
    ['createdAt', record.system.createdAt],
    ['modifiedBy', record.system.modifiedBy],
    ['modifiedAt', record.system.modifiedAt],
    ['changeTag', record.system.changeTag],
    ...Object.entries(record.fields),
  ]);
}

/**
 * Copies identity and system attributes of a stored record onto an object
 */
export function assignSystemFields(object: Persistable, record: StoredRecord): void {
  if (record.identity !== undefined) object.identity = record.identity;
  object.createdBy = record.system.createdBy;
  object.createdAt = record.system.createdAt;
  object.modifiedBy = record.system.modifiedBy;
  object.modifiedAt = record.system.modifiedAt;
  object.changeTag = record.system.changeTag;
}

function assignSystemFieldsFromTree(object: Persistable, tree: JsonObject, typeName: string): void {
  const text = (key: string): string | undefined => {
    const value = tree[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
      throw new MappingError(typeName, `expected string, got ${describeKind(value)}`, key);
    }
    return value;
  };
  const time = (key: string): Date | undefined => {
    const value = tree[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number') {
      throw new MappingError(typeName, `expected epoch timestamp, got ${describeKind(value)}`, key);
    }
    return new Date(value);
  };

  object.identity = text('identity');
  object.createdBy = text('createdBy');
  object.createdAt = time('createdAt');
  object.modifiedBy = text('modifiedBy');
  object.modifiedAt = time('modifiedAt');
  object.changeTag = text('changeTag');
}
