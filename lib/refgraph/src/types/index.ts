/**
 * Types - Core type definitions
 * Tree-shakable: explicit exports for better tree shaking
 */

// Records
export type {
  Identity,
  Primitive,
  AssetHandle,
  RecordReference,
  RecordValue,
  RecordFields,
  SystemFields,
  StoredRecord,
  IdentifiedRecord,
  CycleMarker,
  JsonValue,
  JsonObject,
} from './record';
export {
  SYSTEM_FIELD_NAMES,
  createReference,
  createAsset,
  isRecordReference,
  isAssetHandle,
  isCycleMarker,
  isIdentified,
  referencedIdentities,
} from './record';

// Models
export type {
  Persistable,
  FieldDescriptor,
  CustomCodec,
  ModelSchema,
  FieldInfo,
  IFieldIntrospector,
  NestedDecoder,
  ReferenceValue,
} from './model';
export { FieldKind } from './model';

// Engine types
export type {
  PersistenceOptions,
  ResolvedPersistenceOptions,
  IdentifierStrategy,
  DanglingReferencePolicy,
} from './persistence-options';
export { DEFAULT_PERSISTENCE_OPTIONS, resolvePersistenceOptions } from './persistence-options';
export type { EngineEventHandlers, UnsubscribeFn, IHookManager, LoadSource } from './engine-hooks';
export { EngineEventType } from './engine-hooks';
export type { LoadQuery, LoadPage, ExhaustiveLoadResult } from './load-types';
export { DEFAULT_PAGE_SIZE } from './load-types';

export type { ILogger, ITimingLogger } from './logger';
export { LogLevel, isTimingLogger } from './logger';
