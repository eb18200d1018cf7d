import type { Identity, IdentifiedRecord, Primitive, StoredRecord } from '../../types/record';

/**
 * Comparison operators understood by every store
 */
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'contains';

/**
 * Declarative query predicate
 */
export type Predicate =
  | { readonly type: 'all' }
  | {
      readonly type: 'compare';
      readonly field: string;
      readonly op: ComparisonOperator;
      readonly value: Primitive;
    }
  | { readonly type: 'and'; readonly predicates: readonly Predicate[] }
  | { readonly type: 'or'; readonly predicates: readonly Predicate[] };

/**
 * Predicate builders
 *
 * @example
 * ```typescript
 * const adults = where.and(where.compare('age', '>=', 18), where.compare('active', '==', true));
 * ```
 */
export const where = {
  all(): Predicate {
    return { type: 'all' };
  },
  compare(field: string, op: ComparisonOperator, value: Primitive): Predicate {
    return { type: 'compare', field, op, value };
  },
  and(...predicates: Predicate[]): Predicate {
    return { type: 'and', predicates };
  },
  or(...predicates: Predicate[]): Predicate {
    return { type: 'or', predicates };
  },
};

export interface SortKey {
  readonly field: string;
  readonly descending?: boolean;
}

/**
 * Opaque continuation token of a paginated query
 */
export type Cursor = string;

/**
 * One page request
 */
export interface RecordQuery {
  readonly recordType: string;
  readonly predicate: Predicate;
  readonly sort: readonly SortKey[];
  readonly cursor?: Cursor;
  readonly limit: number;
}

/**
 * Raw match of a query: either a record or the error the store raised for it
 */
export type QueryMatch =
  | { readonly identity: Identity; readonly record: IdentifiedRecord }
  | { readonly identity: Identity; readonly error: Error };

export interface QueryPage {
  readonly matches: readonly QueryMatch[];

  /**
   * Absent on the last page
   */
  readonly nextCursor?: Cursor;
}

/**
 * Backing record store
 *
 * A record may only reference identities that already exist in the store.
 * @category Providers
 */
export interface IRecordStore {
  /**
   * Creates or replaces a record. The store assigns the identity when the
   * record has none and always fills in the system attributes.
   */
  save(record: StoredRecord): Promise<IdentifiedRecord>;

  /**
   * Resolves to null when no record has the identity
   */
  fetch(identity: Identity): Promise<IdentifiedRecord | null>;

  /**
   * Deleting a missing identity is a no-op
   */
  delete(identity: Identity): Promise<void>;

  query(query: RecordQuery): Promise<QueryPage>;
}
