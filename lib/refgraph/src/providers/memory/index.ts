/**
 * In-memory provider implementations for development and testing
 */

export { MemoryRecordCache } from './cache';
export type { MemoryRecordCacheOptions } from './cache';
export { MemoryRecordStore } from './record-store';
export type { MemoryRecordStoreOptions } from './record-store';
export { ConsoleLoggerProvider } from './logger';
