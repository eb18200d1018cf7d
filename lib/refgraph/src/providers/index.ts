/**
 * Providers
 *
 * Provider interfaces and implementations for IoC pattern
 * Tree-shakable: explicit exports instead of export *
 */

// Interfaces
export type { IRecordCacheProvider, CacheStats } from './interfaces';
export type { ILoggerProvider } from './interfaces';
export type {
  IRecordStore,
  RecordQuery,
  QueryPage,
  QueryMatch,
  Predicate,
  ComparisonOperator,
  SortKey,
  Cursor,
} from './interfaces';
export { where } from './interfaces';

// Memory implementations
export { MemoryRecordCache, MemoryRecordStore, ConsoleLoggerProvider } from './memory';
export type { MemoryRecordCacheOptions, MemoryRecordStoreOptions } from './memory';
