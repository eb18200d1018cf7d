/**
 * Opaque identifier of a persisted record
 */
export type Identity = string;

/**
 * Leaf value the store keeps verbatim
 */
export type Primitive = number | string | boolean | Date;

/**
 * Store asset wrapping binary content
 */
export interface AssetHandle {
  readonly type: 'asset';
  readonly data: Uint8Array;
}

/**
 * Pointer to another record. The target identity must already exist in the store.
 */
export interface RecordReference {
  readonly type: 'reference';
  readonly identity: Identity;
}

/**
 * Any value a record field may hold
 */
export type RecordValue =
  | Primitive
  | AssetHandle
  | RecordReference
  | readonly Primitive[]
  | readonly AssetHandle[]
  | readonly RecordReference[];

/**
 * Named fields of a record (system attributes excluded)
 */
export type RecordFields = Record<string, RecordValue>;

/**
 * Store-assigned attributes, read-only to callers
 */
export interface SystemFields {
  readonly createdBy?: string;
  readonly createdAt?: Date;
  readonly modifiedBy?: string;
  readonly modifiedAt?: Date;
  readonly changeTag?: string;
}

/**
 * Generic, store-native representation of an object
 */
export interface StoredRecord {
  /**
   * Unset until the store has accepted the record once
   */
  readonly identity?: Identity;
  readonly recordType: string;
  readonly system: SystemFields;
  readonly fields: RecordFields;
}

/**
 * Stored record that has an identity
 */
export type IdentifiedRecord = StoredRecord & { readonly identity: Identity };

/**
 * Names of system attributes. Never written by the codec.
 */
export const SYSTEM_FIELD_NAMES: readonly string[] = [
  'identity',
  'createdBy',
  'createdAt',
  'modifiedBy',
  'modifiedAt',
  'changeTag',
];

/**
 * Placeholder substituted for a reference whose target is already being
 * resolved higher up in the same load
 */
export interface CycleMarker {
  readonly identity: Identity;
  readonly isCycle: true;
}

/**
 * JSON-safe value produced by sanitizing a record
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export function createReference(identity: Identity): RecordReference {
  return { type: 'reference', identity };
}

export function createAsset(data: Uint8Array): AssetHandle {
  return { type: 'asset', data };
}

export function isRecordReference(value: unknown): value is RecordReference {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'reference' &&
    'identity' in value &&
    typeof value.identity === 'string'
  );
}

export function isAssetHandle(value: unknown): value is AssetHandle {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'asset' &&
    'data' in value &&
    value.data instanceof Uint8Array
  );
}

export function isCycleMarker(value: unknown): value is CycleMarker {
  return (
    typeof value === 'object' &&
    value !== null &&
    'isCycle' in value &&
    value.isCycle === true &&
    'identity' in value &&
    typeof value.identity === 'string'
  );
}

export function isIdentified(record: StoredRecord): record is IdentifiedRecord {
  return typeof record.identity === 'string' && record.identity.length > 0;
}

/**
 * Identities referenced by a record, single and list fields, in field order
 */
export function referencedIdentities(record: StoredRecord): Identity[] {
  const identities: Identity[] = [];
  for (const value of Object.values(record.fields)) {
    if (isRecordReference(value)) {
      identities.push(value.identity);
    } else if (Array.isArray(value)) {
      const items: readonly unknown[] = value;
      for (const item of items) {
        if (isRecordReference(item)) identities.push(item.identity);
      }
    }
  }
  return identities;
}
