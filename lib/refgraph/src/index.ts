// ============================================
// Core
// ============================================
export { createPersistence } from './build';
export type { PersistenceDefinition, PersistenceOperator, ProviderRegistry } from './build';
export { PersistenceEngine, Repository, HookManager } from './engine';
// ============================================
// Operators
// ============================================
export { withOptions } from './operators';
// Provider operators
export { withRecordStore } from './operators';
export { withCacheProvider } from './operators';
export { withLoggerProvider } from './operators';
export { withFieldIntrospector } from './operators';
// ============================================
// Models
// ============================================
export { field, defineModel, SchemaFieldIntrospector } from './model';
export type { FieldOptions } from './model';
// ============================================
// Types
// ============================================
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
  Persistable,
  FieldDescriptor,
  CustomCodec,
  ModelSchema,
  FieldInfo,
  IFieldIntrospector,
  NestedDecoder,
  ReferenceValue,
  PersistenceOptions,
  ResolvedPersistenceOptions,
  IdentifierStrategy,
  DanglingReferencePolicy,
  EngineEventHandlers,
  UnsubscribeFn,
  LoadSource,
  LoadQuery,
  LoadPage,
  ExhaustiveLoadResult,
  ILogger,
  ITimingLogger,
} from './types';
export {
  FieldKind,
  EngineEventType,
  LogLevel,
  isTimingLogger,
  createReference,
  createAsset,
  isRecordReference,
  isAssetHandle,
  isCycleMarker,
  referencedIdentities,
  resolvePersistenceOptions,
  DEFAULT_PERSISTENCE_OPTIONS,
  DEFAULT_PAGE_SIZE,
} from './types';
// ============================================
// Codec and object graph
// ============================================
export { RecordCodec, sanitizeValue, toWire } from './codec';
export type { FieldClassification, ReferenceTarget } from './codec';
export { ObjectArena, CycleDetector } from './graph';
// ============================================
// Errors
// ============================================
export {
  PersistenceError,
  PersistenceErrorCode,
  FieldProcessingFailedError,
  UnsupportedFieldTypeError,
  InvalidReferenceError,
  ReferenceSavingFailedError,
  RecordAlreadyExistsError,
  RecordDoesNotExistError,
  RecordNotFoundError,
  MappingError,
  CircularReferenceRejectedError,
  StoreOperationFailedError,
  isPersistenceError,
  getErrorMessage,
} from './utils/persistence-error';
// ============================================
// Logging
// ============================================
export { LoggerAdapter, ConsoleLoggerAdapter, LoggerManager } from './utils/logging';
// ============================================
// Providers (Interfaces + Memory implementations)
// ============================================
export type {
  IRecordCacheProvider,
  CacheStats,
  ILoggerProvider,
  IRecordStore,
  RecordQuery,
  QueryPage,
  QueryMatch,
  Predicate,
  ComparisonOperator,
  SortKey,
  Cursor,
  MemoryRecordCacheOptions,
  MemoryRecordStoreOptions,
} from './providers';
export { where, MemoryRecordCache, MemoryRecordStore, ConsoleLoggerProvider } from './providers';
