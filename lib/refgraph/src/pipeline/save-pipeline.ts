import { randomUUID } from 'node:crypto';
import type { FieldClassification, ReferenceTarget } from '../codec/record-codec';
import { assignSystemFields } from '../codec/record-codec';
import { EngineEventType } from '../types/engine-hooks';
import type { FieldInfo, ModelSchema, Persistable } from '../types/model';
import type { Identity, IdentifiedRecord, RecordReference, StoredRecord } from '../types/record';
import { createReference, isCycleMarker } from '../types/record';
import {
  FieldProcessingFailedError,
  InvalidReferenceError,
  MappingError,
  RecordAlreadyExistsError,
  RecordDoesNotExistError,
  ReferenceSavingFailedError,
  StoreOperationFailedError,
  getErrorMessage,
  isPersistenceError,
} from '../utils/persistence-error';
import { InFlightRegistry } from './in-flight-registry';
import type { PipelineContext } from './pipeline-context';
import { PreparedRecord } from './prepared-record';

/**
 * - `save`: create or replace
 * - `insert`: the object must not carry an identity
 * - `update`: the object must carry an identity
 */
export type SaveMode = 'save' | 'insert' | 'update';

/**
 * Objects whose save is running in one top-level save, by arena index.
 * The flag tells whether the object's record already exists in the store.
 */
class SaveChain extends Map<number, boolean> {
  /**
   * Chain whose save of a shared object this chain is waiting for
   */
  waitingOn: SaveChain | undefined;

  /**
   * True when `other` waits, directly or through other chains, on this one
   */
  isWaitedOnBy(other: SaveChain): boolean {
    for (let current: SaveChain | undefined = other; current; current = current.waitingOn) {
      if (current === this) {
        return true;
      }
    }
    return false;
  }
}

/**
 * A save registered in the in-flight registry
 */
interface SaveTask {
  readonly object: Persistable;
  readonly owner: SaveChain;
  /**
   * Resolves once the object's record exists
   */
  readonly stored: Promise<Identity>;
  identity?: Identity;
}

/**
 * Writes object graphs as a sequence of single-record saves.
 *
 * A reference is only written once its target exists. Edges that close a
 * cycle are left out of the first write and patched in by a second one.
 */
export class SavePipeline {
  private readonly registry = new InFlightRegistry<IdentifiedRecord, SaveTask>();

  constructor(private readonly context: PipelineContext) {}

  /**
   * Saves `object` and everything it references.
   * Concurrent saves of the same object (or identity), at the top level or
   * anywhere in another save's graph, share one build.
   * @returns The same instance, with identity and system attributes set
   */
  async save<T extends Persistable>(
    object: T,
    schema: ModelSchema<T>,
    mode: SaveMode = 'save'
  ): Promise<T> {
    if (mode === 'insert' && object.identity !== undefined) {
      throw new RecordAlreadyExistsError(object.identity, schema.recordType);
    }
    if (mode === 'update' && object.identity === undefined) {
      throw new RecordDoesNotExistError(schema.recordType);
    }

    return this.runTopLevel(object, schema, object.identity !== undefined);
  }

  /**
   * Inserts when no record has the object's identity, updates otherwise
   */
  async upsert<T extends Persistable>(object: T, schema: ModelSchema<T>): Promise<T> {
    const identity = object.identity;
    if (identity === undefined) {
      return this.save(object, schema, 'insert');
    }

    let existing: IdentifiedRecord | null;
    try {
      existing = await this.context.store.fetch(identity);
    } catch (error) {
      throw new StoreOperationFailedError('upsert-check', schema.recordType, error);
    }

    if (existing) {
      return this.save(object, schema, 'update');
    }
    // Insert under the caller's identity: nothing is addressable yet
    return this.runTopLevel(object, schema, false);
  }

  private async runTopLevel<T extends Persistable>(
    object: T,
    schema: ModelSchema<T>,
    addressable: boolean
  ): Promise<T> {
    const key = this.keyOf(object);
    const running = this.registry.get(key);
    if (running && running.meta.object !== object) {
      this.context.logger.warn(
        `Save of '${schema.recordType}' ${key} joined a running save of another instance; its own changes are not written`
      );
    }

    const saved = await (running?.promise ?? this.track(key, object, schema, addressable, new SaveChain()));
    // A concurrent caller may hold another instance with the same identity
    assignSystemFields(object, saved);
    return object;
  }

  private keyOf(object: Persistable): string {
    return object.identity ?? `obj#${this.context.arena.indexOf(object)}`;
  }

  /**
   * Registers and starts the save of `object` as part of `chain`
   */
  private track<T extends Persistable>(
    key: string,
    object: T,
    schema: ModelSchema<T>,
    addressable: boolean,
    chain: SaveChain
  ): Promise<IdentifiedRecord> {
    let markStored: (identity: Identity) => void = () => undefined;
    const task: SaveTask = {
      object,
      owner: chain,
      stored: new Promise<Identity>(resolve => {
        markStored = resolve;
      }),
    };

    return this.registry.run(
      key,
      () =>
        this.saveObject(object, schema, addressable, chain, identity => {
          task.identity = identity;
          markStored(identity);
        }),
      task
    );
  }

  private async saveObject<T extends Persistable>(
    object: T,
    schema: ModelSchema<T>,
    addressable: boolean,
    chain: SaveChain,
    onStored?: (identity: Identity) => void
  ): Promise<IdentifiedRecord> {
    const { logger } = this.context;
    const index = this.context.arena.indexOf(object);
    const typeName = schema.recordType;

    chain.set(index, addressable);
    try {
      const prepared = new PreparedRecord(
        typeName,
        object.identity ?? this.generateIdentity(object, schema)
      );

      if (schema.codec) {
        try {
          prepared.assign(schema.codec.encode(object));
        } catch (error) {
          throw isPersistenceError(error)
            ? error
            : new MappingError(typeName, `custom encoder failed: ${getErrorMessage(error)}`, undefined, error);
        }
      } else {
        for (const info of this.context.introspector.fields(object, schema)) {
          try {
            await this.processField(info, object, prepared, addressable, chain);
          } catch (error) {
            throw new FieldProcessingFailedError(info.name, typeName, error);
          }
        }
      }

      const saved = await this.persist(prepared.toRecord(), 'save', prepared.identity);
      assignSystemFields(object, saved);
      chain.set(index, true);
      this.context.cache.put(saved);
      onStored?.(saved.identity);
      this.context.hooks.emit(EngineEventType.RECORD_SAVED, {
        identity: saved.identity,
        recordType: typeName,
        patched: false,
      });

      if (!prepared.hasPending) {
        return saved;
      }

      let patched = saved;
      for (const pending of prepared.pendingReferences) {
        const cached = pending.object.identity !== undefined && this.context.cache.get(pending.object.identity);
        const identity = cached
          ? cached.identity
          : await this.saveBranch(pending.field, typeName, pending.object, pending.schema, chain);
        patched = PreparedRecord.patch(patched, pending.field, identity);
      }

      const final = await this.persist(patched, 'patch', saved.identity);
      assignSystemFields(object, final);
      this.context.cache.put(final);
      this.context.hooks.emit(EngineEventType.RECORD_SAVED, {
        identity: final.identity,
        recordType: typeName,
        patched: true,
      });
      logger.debug(
        `Patched ${prepared.pendingReferences.length} deferred reference(s) into '${typeName}' ${final.identity}`
      );
      return final;
    } finally {
      chain.delete(index);
    }
  }

  private async processField(
    info: FieldInfo,
    object: Persistable,
    prepared: PreparedRecord,
    addressable: boolean,
    chain: SaveChain
  ): Promise<void> {
    const typeName = prepared.recordType;
    const classification: FieldClassification = this.context.codec.classify(info, typeName);

    switch (classification.kind) {
      case 'absent':
        return;
      case 'reference':
        await this.processReference(
          info.name,
          classification.value,
          classification.target,
          object,
          prepared,
          addressable,
          chain
        );
        return;
      case 'referenceList': {
        const references: RecordReference[] = [];
        for (const [position, element] of classification.value.entries()) {
          references.push(
            await this.resolveListElement(
              `${info.name}[${position}]`,
              element,
              classification.target,
              object,
              typeName,
              addressable,
              chain
            )
          );
        }
        prepared.set(info.name, references);
        return;
      }
      default: {
        const leaf = this.context.codec.encodeLeaf(classification);
        if (leaf !== undefined) {
          prepared.set(info.name, leaf);
        }
      }
    }
  }

  private async processReference(
    field: string,
    value: ReferenceTarget,
    targetSchema: ModelSchema<Persistable>,
    object: Persistable,
    prepared: PreparedRecord,
    addressable: boolean,
    chain: SaveChain
  ): Promise<void> {
    const { cache, detector, hooks, logger, options } = this.context;
    const typeName = prepared.recordType;

    if (isCycleMarker(value)) {
      prepared.set(field, createReference(value.identity));
      return;
    }

    // Target is an ancestor in this chain: its record exists or it closes a cycle
    const ancestorStored = chain.get(this.context.arena.indexOf(value));
    if (ancestorStored !== undefined) {
      if (ancestorStored && value.identity !== undefined) {
        prepared.set(field, createReference(value.identity));
      } else {
        this.deferReference(prepared, { field, object: value, schema: targetSchema });
      }
      return;
    }

    if (value.identity !== undefined && cache.get(value.identity)) {
      prepared.set(field, createReference(value.identity));
      return;
    }

    if (addressable) {
      const identity = await this.saveBranch(field, typeName, value, targetSchema, chain);
      prepared.set(field, createReference(identity));
      return;
    }

    if (detector.hasPathBackTo(value, targetSchema, object)) {
      this.deferReference(prepared, { field, object: value, schema: targetSchema });
      return;
    }

    if (options.danglingReferencePolicy === 'defer') {
      this.deferReference(prepared, { field, object: value, schema: targetSchema });
      return;
    }

    logger.warn(
      `Reference field '${field}' of '${typeName}' skipped: target is unsaved and the parent has no identity`
    );
    hooks.emit(EngineEventType.REFERENCE_SKIPPED, { recordType: typeName, field });
  }

  private async resolveListElement(
    label: string,
    element: ReferenceTarget,
    targetSchema: ModelSchema<Persistable>,
    parent: Persistable,
    typeName: string,
    addressable: boolean,
    chain: SaveChain
  ): Promise<RecordReference> {
    if (isCycleMarker(element)) {
      return createReference(element.identity);
    }

    const ancestorStored = chain.get(this.context.arena.indexOf(element));
    if (ancestorStored !== undefined) {
      if (ancestorStored && element.identity !== undefined) {
        return createReference(element.identity);
      }
      throw new InvalidReferenceError(label, typeName, 'list element points back to an unsaved object');
    }

    if (element.identity !== undefined && this.context.cache.get(element.identity)) {
      return createReference(element.identity);
    }

    if (!addressable && this.context.detector.hasPathBackTo(element, targetSchema, parent)) {
      throw new InvalidReferenceError(label, typeName, 'cyclic list elements cannot be deferred');
    }

    return createReference(await this.saveBranch(label, typeName, element, targetSchema, chain));
  }

  /**
   * Saves a dependent object and returns its identity
   */
  private async saveBranch(
    field: string,
    typeName: string,
    target: Persistable,
    targetSchema: ModelSchema<Persistable>,
    chain: SaveChain
  ): Promise<Identity> {
    if (chain.get(this.context.arena.indexOf(target)) === false) {
      throw new InvalidReferenceError(field, typeName, 'target is still being saved');
    }

    let identity: Identity;
    try {
      identity = await this.saveShared(field, typeName, target, targetSchema, chain);
    } catch (error) {
      throw new ReferenceSavingFailedError(field, typeName, error);
    }

    if (!identity) {
      throw new InvalidReferenceError(field, typeName, 'saved target has no identity');
    }
    return identity;
  }

  /**
   * Starts the target's save in this chain, or joins the one another chain
   * is running. Joining waits for the target's first write only.
   * A chain never waits on a chain that already waits on it.
   */
  private async saveShared(
    field: string,
    typeName: string,
    target: Persistable,
    targetSchema: ModelSchema<Persistable>,
    chain: SaveChain
  ): Promise<Identity> {
    const key = this.keyOf(target);
    const running = this.registry.get(key);

    if (!running) {
      const saved = await this.track(key, target, targetSchema, target.identity !== undefined, chain);
      return saved.identity;
    }

    const task = running.meta;
    if (task.identity !== undefined) {
      return task.identity;
    }

    if (task.owner === chain || chain.isWaitedOnBy(task.owner)) {
      // Another instance with the same identity, or a wait that would never end
      if (target.identity === undefined) {
        throw new InvalidReferenceError(field, typeName, 'target is being saved by a save that waits on this one');
      }
      const saved = await this.saveObject(target, targetSchema, true, chain);
      return saved.identity;
    }

    chain.waitingOn = task.owner;
    try {
      return await Promise.race([task.stored, running.promise.then(saved => saved.identity)]);
    } finally {
      chain.waitingOn = undefined;
    }
  }

  private deferReference(
    prepared: PreparedRecord,
    reference: { field: string; object: Persistable; schema: ModelSchema<Persistable> }
  ): void {
    prepared.defer(reference);
    this.context.hooks.emit(EngineEventType.REFERENCE_DEFERRED, {
      recordType: prepared.recordType,
      field: reference.field,
    });
  }

  private async persist(
    record: StoredRecord,
    operation: string,
    expectedIdentity: Identity | undefined
  ): Promise<IdentifiedRecord> {
    let saved: IdentifiedRecord;
    try {
      saved = await this.context.store.save(record);
    } catch (error) {
      throw new StoreOperationFailedError(operation, record.recordType, error);
    }

    if (expectedIdentity !== undefined && saved.identity !== expectedIdentity) {
      throw new StoreOperationFailedError(
        operation,
        record.recordType,
        new Error(`store answered with identity '${saved.identity}' for '${expectedIdentity}'`)
      );
    }
    return saved;
  }

  private generateIdentity(object: Persistable, schema: ModelSchema<Persistable>): Identity | undefined {
    const strategy = this.context.options.identifierStrategy;

    switch (strategy.kind) {
      case 'store':
        return undefined;
      case 'uuid':
        return randomUUID();
      case 'generator':
        return strategy.generate(schema.recordType);
      case 'field': {
        const value = this.context.introspector
          .fields(object, schema)
          .find(info => info.name === strategy.field)?.value;
        return typeof value === 'string' && value.length > 0 ? value : undefined;
      }
    }
  }
}
