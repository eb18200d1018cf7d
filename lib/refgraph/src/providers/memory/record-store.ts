import type {
  ComparisonOperator,
  IRecordStore,
  Predicate,
  QueryPage,
  RecordQuery,
  SortKey,
} from '../interfaces/record-store';
import type {
  Identity,
  IdentifiedRecord,
  Primitive,
  RecordValue,
  StoredRecord,
} from '../../types/record';
import { isRecordReference, referencedIdentities } from '../../types/record';

export interface MemoryRecordStoreOptions {
  /**
   * Name written to createdBy and modifiedBy
   * @default 'local'
   */
  user?: string;

  /**
   * Millisecond clock used for system timestamps
   */
  clock?: () => number;
}

type Comparable = string | number | boolean;

function toComparable(value: RecordValue | string | undefined): Comparable | undefined {
  if (value === undefined) return undefined;
  if (value instanceof Date) return value.getTime();
  if (isRecordReference(value)) return value.identity;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return undefined;
}

function compareComparable(left: Comparable, right: Comparable): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * In-process record store
 *
 * Assigns identities and system attributes, rejects records that reference
 * missing identities and paginates queries with offset cursors.
 * @category Providers
 */
export class MemoryRecordStore implements IRecordStore {
  private readonly records = new Map<Identity, IdentifiedRecord>();
  private readonly user: string;
  private readonly clock: () => number;
  private sequence = 0;

  constructor(options: MemoryRecordStoreOptions = {}) {
    this.user = options.user ?? 'local';
    this.clock = options.clock ?? Date.now;
  }

  async save(record: StoredRecord): Promise<IdentifiedRecord> {
    const missing = referencedIdentities(record).find(
      identity => identity !== record.identity && !this.records.has(identity)
    );
    if (missing !== undefined) {
      throw new Error(`Reference to missing record '${missing}'`);
    }

    const existing = record.identity !== undefined ? this.records.get(record.identity) : undefined;
    if (existing && existing.recordType !== record.recordType) {
      throw new Error(
        `Record '${existing.identity}' has type '${existing.recordType}', not '${record.recordType}'`
      );
    }

    const identity = record.identity ?? this.nextIdentity();
    const now = new Date(this.clock());
    const changeCount = existing ? Number(existing.system.changeTag ?? '0') + 1 : 1;

    const saved: IdentifiedRecord = {
      identity,
      recordType: record.recordType,
      fields: { ...record.fields },
      system: {
        createdBy: existing?.system.createdBy ?? this.user,
        createdAt: existing?.system.createdAt ?? now,
        modifiedBy: this.user,
        modifiedAt: now,
        changeTag: String(changeCount),
      },
    };

    this.records.set(identity, saved);
    return saved;
  }

  async fetch(identity: Identity): Promise<IdentifiedRecord | null> {
    return this.records.get(identity) ?? null;
  }

  async delete(identity: Identity): Promise<void> {
    this.records.delete(identity);
  }

  async query(query: RecordQuery): Promise<QueryPage> {
    if (!Number.isInteger(query.limit) || query.limit <= 0) {
      throw new Error(`Query limit must be a positive integer, got ${query.limit}`);
    }

    const offset = query.cursor === undefined ? 0 : Number(query.cursor);
    if (!Number.isInteger(offset) || offset < 0) {
      throw new Error(`Invalid cursor '${query.cursor ?? ''}'`);
    }

    const matching = Array.from(this.records.values())
      .filter(record => record.recordType === query.recordType)
      .filter(record => this.matches(record, query.predicate))
      .sort((left, right) => this.compareRecords(left, right, query.sort));

    const end = offset + query.limit;
    return {
      matches: matching.slice(offset, end).map(record => ({ identity: record.identity, record })),
      nextCursor: end < matching.length ? String(end) : undefined,
    };
  }

  /**
   * Number of stored records
   */
  get size(): number {
    return this.records.size;
  }

  /**
   * Checks whether a record exists, without going through the async API
   */
  has(identity: Identity): boolean {
    return this.records.has(identity);
  }

  clear(): void {
    this.records.clear();
  }

  private nextIdentity(): Identity {
    this.sequence++;
    return `rec-${this.sequence}`;
  }

  private valueOf(record: IdentifiedRecord, field: string): RecordValue | string | undefined {
    switch (field) {
      case 'identity':
        return record.identity;
      case 'createdBy':
      case 'modifiedBy':
      case 'changeTag':
      case 'createdAt':
      case 'modifiedAt':
        return record.system[field];
      default:
        return record.fields[field];
    }
  }

  private matches(record: IdentifiedRecord, predicate: Predicate): boolean {
    switch (predicate.type) {
      case 'all':
        return true;
      case 'and':
        return predicate.predicates.every(inner => this.matches(record, inner));
      case 'or':
        return predicate.predicates.some(inner => this.matches(record, inner));
      case 'compare':
        return this.compareField(this.valueOf(record, predicate.field), predicate.op, predicate.value);
    }
  }

  private compareField(
    value: RecordValue | string | undefined,
    op: ComparisonOperator,
    expected: Primitive
  ): boolean {
    const right = toComparable(expected);
    if (right === undefined) return false;

    if (op === 'contains') {
      if (typeof value === 'string' && typeof right === 'string') {
        return value.includes(right);
      }
      if (Array.isArray(value)) {
        const items: readonly RecordValue[] = value;
        return items.some(item => toComparable(item) === right);
      }
      return false;
    }

    const left = toComparable(Array.isArray(value) ? undefined : value);
    if (left === undefined) {
      return op === '!=';
    }

    const order = compareComparable(left, right);
    switch (op) {
      case '==':
        return order === 0;
      case '!=':
        return order !== 0;
      case '<':
        return order < 0;
      case '<=':
        return order <= 0;
      case '>':
        return order > 0;
      case '>=':
        return order >= 0;
    }
  }

  private compareRecords(
    left: IdentifiedRecord,
    right: IdentifiedRecord,
    sort: readonly SortKey[]
  ): number {
    for (const key of sort) {
      const a = toComparable(this.valueOf(left, key.field));
      const b = toComparable(this.valueOf(right, key.field));
      if (a === b) continue;
      // Missing values sort last in either direction
      if (a === undefined) return 1;
      if (b === undefined) return -1;
      const order = compareComparable(a, b);
      return key.descending ? -order : order;
    }
    return 0;
  }
}
