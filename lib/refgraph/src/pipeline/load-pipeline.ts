import { EMPTY, Observable, defer, expand, lastValueFrom, reduce } from 'rxjs';
import { sanitizeValue, toWire } from '../codec/record-codec';
import type { Cursor, QueryPage } from '../providers/interfaces/record-store';
import { where } from '../providers/interfaces/record-store';
import { EngineEventType } from '../types/engine-hooks';
import type { ExhaustiveLoadResult, LoadPage, LoadQuery } from '../types/load-types';
import { DEFAULT_PAGE_SIZE } from '../types/load-types';
import type { ModelSchema, Persistable } from '../types/model';
import type { Identity, IdentifiedRecord, JsonObject, JsonValue } from '../types/record';
import { isRecordReference } from '../types/record';
import {
  CircularReferenceRejectedError,
  MappingError,
  PersistenceError,
  RecordNotFoundError,
  StoreOperationFailedError,
  getErrorMessage,
  isPersistenceError,
} from '../utils/persistence-error';
import type { PipelineContext } from './pipeline-context';

/**
 * Reads records through the cache and decodes them into objects,
 * inlining referenced records
 */
export class LoadPipeline {
  constructor(private readonly context: PipelineContext) {}

  /**
   * Loads one object.
   * Records fetched from the store are cached before decoding; a record that
   * fails to decode is evicted again.
   */
  async loadByIdentity<T extends Persistable>(identity: Identity, schema: ModelSchema<T>): Promise<T> {
    const { cache, detector, hooks, options } = this.context;
    const typeName = schema.recordType;

    const cached = cache.get(identity);
    if (cached) {
      const tree = await this.resolveTree(cached, new Set(), typeName);
      hooks.emit(EngineEventType.RECORD_LOADED, { identity, recordType: typeName, source: 'cache' });
      try {
        return this.context.codec.decode(schema, tree);
      } catch (error) {
        throw toMappingError(typeName, error);
      }
    }

    const record = await this.fetchRecord(identity, typeName);
    if (!record) {
      throw new RecordNotFoundError(identity, typeName);
    }
    cache.put(record);

    // Only what was already cached counts: a cold graph loads with cycle markers
    if (options.rejectCyclicFetches && detector.recordHasCycle(record, id => cache.peekFresh(id))) {
      this.evict(identity);
      throw new CircularReferenceRejectedError(identity, typeName);
    }

    const tree = await this.resolveTree(record, new Set(), typeName);

    hooks.emit(EngineEventType.RECORD_LOADED, { identity, recordType: typeName, source: 'store' });
    try {
      return this.context.codec.decode(schema, tree);
    } catch (error) {
      this.evict(identity);
      throw toMappingError(typeName, error);
    }
  }

  /**
   * Loads one page. Records that fail are reported in `partialErrors`
   * and do not fail the page.
   * @throws StoreOperationFailedError when the page query itself fails
   */
  async loadAll<T extends Persistable>(schema: ModelSchema<T>, query: LoadQuery = {}): Promise<LoadPage<T>> {
    const { cache, hooks } = this.context;
    const typeName = schema.recordType;

    let page: QueryPage;
    try {
      page = await this.context.store.query({
        recordType: typeName,
        predicate: query.predicate ?? where.all(),
        sort: query.sort ?? [],
        cursor: query.cursor,
        limit: query.limit ?? DEFAULT_PAGE_SIZE,
      });
    } catch (error) {
      throw new StoreOperationFailedError('query', typeName, error);
    }

    const records: IdentifiedRecord[] = [];
    for (const match of page.matches) {
      if ('record' in match) {
        records.push(match.record);
      }
    }
    cache.putMany(records);

    const objects: T[] = [];
    const partialErrors = new Map<Identity, PersistenceError>();
    const addPartialError = (identity: Identity, error: PersistenceError): void => {
      if (partialErrors.has(identity)) {
        return;
      }
      partialErrors.set(identity, error);
      hooks.emit(EngineEventType.PARTIAL_ERROR, { identity, recordType: typeName, error });
    };

    for (const match of page.matches) {
      if ('error' in match) {
        addPartialError(match.identity, new StoreOperationFailedError('query', typeName, match.error));
        continue;
      }
      try {
        const tree = await this.resolveTree(match.record, new Set(), typeName);
        objects.push(this.context.codec.decode(schema, tree));
        hooks.emit(EngineEventType.RECORD_LOADED, {
          identity: match.identity,
          recordType: typeName,
          source: 'store',
        });
      } catch (error) {
        this.evict(match.identity);
        addPartialError(
          match.identity,
          isPersistenceError(error) ? error : toMappingError(typeName, error)
        );
      }
    }

    if (partialErrors.size > 0) {
      this.context.logger.warn(
        `Loaded ${objects.length} '${typeName}' record(s) with ${partialErrors.size} partial error(s)`
      );
    }

    return { objects, nextCursor: page.nextCursor, partialErrors };
  }

  /**
   * Loads the page that follows `cursor`
   */
  loadNext<T extends Persistable>(
    schema: ModelSchema<T>,
    cursor: Cursor,
    limit: number,
    query: LoadQuery = {}
  ): Promise<LoadPage<T>> {
    return this.loadAll(schema, { ...query, cursor, limit });
  }

  /**
   * Emits every page of a query in order, then completes.
   * Errors with the first failing page.
   */
  pages<T extends Persistable>(schema: ModelSchema<T>, query: LoadQuery = {}): Observable<LoadPage<T>> {
    return defer(() => this.loadAll(schema, query)).pipe(
      expand(page => {
        const cursor = page.nextCursor;
        return cursor === undefined ? EMPTY : defer(() => this.loadAll(schema, { ...query, cursor }));
      })
    );
  }

  /**
   * Follows cursors to the end of the query.
   * The first partial error recorded for an identity wins.
   */
  loadAllExhaustive<T extends Persistable>(
    schema: ModelSchema<T>,
    query: LoadQuery = {}
  ): Promise<ExhaustiveLoadResult<T>> {
    const seed: ExhaustiveLoadResult<T> = { objects: [], partialErrors: new Map() };

    return lastValueFrom(
      this.pages(schema, query).pipe(
        reduce((result, page) => {
          result.objects.push(...page.objects);
          page.partialErrors.forEach((error, identity) => {
            if (!result.partialErrors.has(identity)) {
              result.partialErrors.set(identity, error);
            }
          });
          return result;
        }, seed)
      )
    );
  }

  /**
   * Builds the JSON tree of a record with referenced records inlined.
   * `resolving` is shared by the whole walk: an identity met a second time
   * becomes a cycle marker.
   */
  private async resolveTree(
    record: IdentifiedRecord,
    resolving: Set<Identity>,
    typeName: string
  ): Promise<JsonObject> {
    resolving.add(record.identity);
    const tree = toWire({ ...record, fields: {} });

    for (const [name, value] of Object.entries(record.fields)) {
      if (isRecordReference(value)) {
        const nested = await this.resolveReference(value.identity, resolving, typeName);
        if (nested !== undefined) {
          tree[name] = nested;
        }
      } else if (Array.isArray(value)) {
        const items: readonly unknown[] = value;
        const resolved: JsonValue[] = [];
        for (const item of items) {
          const json = isRecordReference(item)
            ? await this.resolveReference(item.identity, resolving, typeName)
            : sanitizeValue(item);
          if (json !== undefined) {
            resolved.push(json);
          }
        }
        tree[name] = resolved;
      } else {
        const json = sanitizeValue(value);
        if (json !== undefined) {
          tree[name] = json;
        }
      }
    }

    return tree;
  }

  private async resolveReference(
    identity: Identity,
    resolving: Set<Identity>,
    typeName: string
  ): Promise<JsonObject | undefined> {
    if (resolving.has(identity)) {
      return { identity, isCycle: true };
    }

    let record = this.context.cache.get(identity);
    if (!record) {
      const fetched = await this.fetchRecord(identity, typeName);
      if (!fetched) {
        this.context.logger.warn(`Reference to missing record '${identity}' dropped while loading '${typeName}'`);
        return undefined;
      }
      this.context.cache.put(fetched);
      record = fetched;
    }

    return this.resolveTree(record, resolving, typeName);
  }

  private async fetchRecord(identity: Identity, typeName: string): Promise<IdentifiedRecord | null> {
    try {
      return await this.context.store.fetch(identity);
    } catch (error) {
      throw new StoreOperationFailedError('fetch', typeName, error);
    }
  }

  private evict(identity: Identity): void {
    if (this.context.cache.invalidate(identity)) {
      this.context.hooks.emit(EngineEventType.CACHE_INVALIDATED, [identity]);
    }
  }
}

function toMappingError(typeName: string, error: unknown): MappingError {
  return error instanceof MappingError
    ? error
    : new MappingError(typeName, getErrorMessage(error), undefined, error);
}
