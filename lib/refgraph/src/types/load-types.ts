import type { Cursor, Predicate, SortKey } from '../providers/interfaces/record-store';
import type { Identity } from './record';
import type { PersistenceError } from '../utils/persistence-error';

/**
 * Bulk load request. Every member is optional.
 */
export interface LoadQuery {
  /**
   * @default where.all()
   */
  readonly predicate?: Predicate;
  readonly sort?: readonly SortKey[];

  /**
   * Page size
   * @default 100
   */
  readonly limit?: number;
  readonly cursor?: Cursor;
}

/**
 * One page of decoded objects
 */
export interface LoadPage<T> {
  readonly objects: T[];

  /**
   * Absent on the last page
   */
  readonly nextCursor?: Cursor;

  /**
   * Records that failed to decode or that the store could not return
   */
  readonly partialErrors: Map<Identity, PersistenceError>;
}

/**
 * Every page of a query merged in arrival order
 */
export interface ExhaustiveLoadResult<T> {
  readonly objects: T[];
  readonly partialErrors: Map<Identity, PersistenceError>;
}

export const DEFAULT_PAGE_SIZE = 100;
