import type { ModelSchema, Persistable } from '../types/model';
import type {
  Identity,
  IdentifiedRecord,
  RecordFields,
  RecordValue,
  StoredRecord,
} from '../types/record';
import { createReference, isRecordReference } from '../types/record';

/**
 * Reference field left out of the first write because its target could not
 * be addressed yet
 */
export interface PendingReference {
  readonly field: string;
  readonly object: Persistable;
  readonly schema: ModelSchema<Persistable>;
}

/**
 * Record under construction by one save, with its deferred references
 */
export class PreparedRecord {
  private readonly fields: RecordFields = {};
  private readonly pending: PendingReference[] = [];

  constructor(
    readonly recordType: string,
    readonly identity?: Identity
  ) {}

  set(field: string, value: RecordValue): void {
    this.fields[field] = value;
  }

  assign(fields: RecordFields): void {
    Object.assign(this.fields, fields);
  }

  defer(reference: PendingReference): void {
    this.pending.push(reference);
  }

  /**
   * Deferred references in insertion order
   */
  get pendingReferences(): readonly PendingReference[] {
    return this.pending;
  }

  get hasPending(): boolean {
    return this.pending.length > 0;
  }

  toRecord(): StoredRecord {
    return {
      identity: this.identity,
      recordType: this.recordType,
      system: {},
      fields: { ...this.fields },
    };
  }

  /**
   * Writes a reference into a saved record: appended when the field already
   * holds a reference list, set otherwise
   */
  static patch(record: IdentifiedRecord, field: string, identity: Identity): IdentifiedRecord {
    const current = record.fields[field];
    const reference = createReference(identity);

    let value: RecordValue = reference;
    if (Array.isArray(current)) {
      const items: readonly unknown[] = current;
      value = [...items.filter(isRecordReference), reference];
    }

    return { ...record, fields: { ...record.fields, [field]: value } };
  }
}
