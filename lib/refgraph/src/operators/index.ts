/**
 * Operators
 * Tree-shakable operators for building a persistence engine
 */

export { withOptions } from './with-options';

// IoC Provider operators (Inversion of Control)
export { withRecordStore } from './with-record-store';
export { withCacheProvider } from './with-cache';
export { withLoggerProvider } from './with-logger';
export { withFieldIntrospector } from './with-field-introspector';
