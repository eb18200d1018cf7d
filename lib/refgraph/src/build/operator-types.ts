import type { IRecordCacheProvider } from '../providers/interfaces/cache';
import type { ILoggerProvider } from '../providers/interfaces/logger';
import type { IRecordStore } from '../providers/interfaces/record-store';
import type { IFieldIntrospector } from '../types/model';
import type { PersistenceOptions } from '../types/persistence-options';

/**
 * Provider registry for IoC pattern
 * @category Providers
 */
export interface ProviderRegistry {
  readonly store?: IRecordStore;
  readonly cache?: IRecordCacheProvider;
  readonly logger?: ILoggerProvider;
  readonly introspector?: IFieldIntrospector;
}

/**
 * Immutable description of an engine, assembled by operators
 */
export interface PersistenceDefinition {
  readonly providers: ProviderRegistry;
  readonly options: PersistenceOptions;
}

/**
 * Persistence operator function
 * Transforms a definition, registering providers or options
 */
export interface PersistenceOperator {
  (definition: PersistenceDefinition): PersistenceDefinition;
}
