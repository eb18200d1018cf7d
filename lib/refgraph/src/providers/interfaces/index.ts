/**
 * Provider interfaces
 */

export type { IRecordCacheProvider, CacheStats } from './cache';
export type { ILoggerProvider } from './logger';
export type {
  IRecordStore,
  RecordQuery,
  QueryPage,
  QueryMatch,
  Predicate,
  ComparisonOperator,
  SortKey,
  Cursor,
} from './record-store';
export { where } from './record-store';
