import type { Identity } from './record';
import { LogLevel } from './logger';

/**
 * How a record identity is chosen for an object saved without one
 */
export type IdentifierStrategy =
  /** The store assigns the identity */
  | { readonly kind: 'store' }
  /** A random UUID generated client-side */
  | { readonly kind: 'uuid' }
  /** A caller-supplied generator */
  | { readonly kind: 'generator'; readonly generate: (recordType: string) => Identity }
  /** Read from a model field; falls back to the store when the field is empty */
  | { readonly kind: 'field'; readonly field: string };

/**
 * What the save pipeline does with a reference it can neither resolve nor
 * defer as a cycle (parent without identity, target without a path back)
 */
export type DanglingReferencePolicy = 'defer' | 'skip';

/**
 * Options of the persistence engine
 */
export interface PersistenceOptions {
  /**
   * @default { kind: 'store' }
   */
  identifierStrategy?: IdentifierStrategy;

  /**
   * Record cache time-to-live in seconds
   * @default 30
   */
  cacheTtl?: number;

  /**
   * Advisory record cache size
   * @default 1000
   */
  cacheMaxEntries?: number;

  /**
   * Verbosity of the engine logger
   */
  logLevel?: LogLevel;

  /**
   * @default 'defer'
   */
  danglingReferencePolicy?: DanglingReferencePolicy;

  /**
   * Reject a fetched record whose cached reference graph contains a cycle
   * @default true
   */
  rejectCyclicFetches?: boolean;
}

export type ResolvedPersistenceOptions = Required<Omit<PersistenceOptions, 'logLevel'>> &
  Pick<PersistenceOptions, 'logLevel'>;

export const DEFAULT_PERSISTENCE_OPTIONS: ResolvedPersistenceOptions = {
  identifierStrategy: { kind: 'store' },
  cacheTtl: 30,
  cacheMaxEntries: 1000,
  danglingReferencePolicy: 'defer',
  rejectCyclicFetches: true,
};

/**
 * Applies defaults and validates option values
 * @throws Error on invalid values
 */
export function resolvePersistenceOptions(
  options: PersistenceOptions = {}
): ResolvedPersistenceOptions {
  const resolved: ResolvedPersistenceOptions = {
    identifierStrategy:
      options.identifierStrategy ?? DEFAULT_PERSISTENCE_OPTIONS.identifierStrategy,
    cacheTtl: options.cacheTtl ?? DEFAULT_PERSISTENCE_OPTIONS.cacheTtl,
    cacheMaxEntries: options.cacheMaxEntries ?? DEFAULT_PERSISTENCE_OPTIONS.cacheMaxEntries,
    danglingReferencePolicy:
      options.danglingReferencePolicy ?? DEFAULT_PERSISTENCE_OPTIONS.danglingReferencePolicy,
    rejectCyclicFetches:
      options.rejectCyclicFetches ?? DEFAULT_PERSISTENCE_OPTIONS.rejectCyclicFetches,
    logLevel: options.logLevel,
  };

  if (!Number.isFinite(resolved.cacheTtl) || resolved.cacheTtl <= 0) {
    throw new Error(`cacheTtl must be a positive number of seconds, got ${resolved.cacheTtl}`);
  }
  if (!Number.isInteger(resolved.cacheMaxEntries) || resolved.cacheMaxEntries < 0) {
    throw new Error(
      `cacheMaxEntries must be a non-negative integer, got ${resolved.cacheMaxEntries}`
    );
  }
  if (resolved.danglingReferencePolicy !== 'defer' && resolved.danglingReferencePolicy !== 'skip') {
    throw new Error(`Unknown danglingReferencePolicy '${String(resolved.danglingReferencePolicy)}'`);
  }
  const strategy = resolved.identifierStrategy;
  if (strategy.kind === 'field' && strategy.field.length === 0) {
    throw new Error('identifierStrategy field name must not be empty');
  }
  if (resolved.logLevel !== undefined && LogLevel[resolved.logLevel] === undefined) {
    throw new Error(`Unknown logLevel ${String(resolved.logLevel)}`);
  }

  return resolved;
}

