import type { Observable } from 'rxjs';
import type { Cursor } from '../providers/interfaces/record-store';
import type { LoadPipeline } from '../pipeline/load-pipeline';
import type { SavePipeline } from '../pipeline/save-pipeline';
import type { PipelineContext } from '../pipeline/pipeline-context';
import { EngineEventType } from '../types/engine-hooks';
import type { ExhaustiveLoadResult, LoadPage, LoadQuery } from '../types/load-types';
import { DEFAULT_PAGE_SIZE } from '../types/load-types';
import type { ModelSchema, Persistable } from '../types/model';
import { isTimingLogger } from '../types/logger';
import type { Identity, IdentifiedRecord } from '../types/record';
import { referencedIdentities } from '../types/record';
import {
  RecordDoesNotExistError,
  StoreOperationFailedError,
  getErrorMessage,
  isError,
} from '../utils/persistence-error';

/**
 * Typed facade over the save and load pipelines for one model
 */
export class Repository<T extends Persistable> {
  constructor(
    readonly schema: ModelSchema<T>,
    private readonly context: PipelineContext,
    private readonly savePipeline: SavePipeline,
    private readonly loadPipeline: LoadPipeline
  ) {}

  get recordType(): string {
    return this.schema.recordType;
  }

  /**
   * Saves the object graph rooted at `object`
   * @returns The same instance with identity and system attributes set
   */
  save(object: T): Promise<T> {
    return this.track('save', () => this.savePipeline.save(object, this.schema));
  }

  /**
   * @throws RecordAlreadyExistsError when the object already has an identity
   */
  insert(object: T): Promise<T> {
    return this.track('insert', () => this.savePipeline.save(object, this.schema, 'insert'));
  }

  /**
   * @throws RecordDoesNotExistError when the object has no identity
   */
  update(object: T): Promise<T> {
    return this.track('update', () => this.savePipeline.save(object, this.schema, 'update'));
  }

  upsert(object: T): Promise<T> {
    return this.track('upsert', () => this.savePipeline.upsert(object, this.schema));
  }

  /**
   * Deletes the object's record and evicts it from the cache
   */
  delete(object: T): Promise<void> {
    return this.track('delete', async () => {
      const identity = this.requireIdentity(object);
      await this.deleteRecord(identity, this.recordType);
      this.evict([identity]);
    });
  }

  /**
   * Deletes the object's record and every record reachable from it through
   * cached references
   * @returns Deleted identities, root last
   */
  deleteCascade(object: T): Promise<Identity[]> {
    return this.track('deleteCascade', async () => {
      const { cache } = this.context;
      const identity = this.requireIdentity(object);

      if (!cache.peek(identity)) {
        const fetched = await this.fetch(identity);
        if (!fetched) {
          return [];
        }
        cache.put(fetched);
      }

      const reachable = this.reachableFrom(identity);
      for (const child of reachable) {
        await this.deleteRecord(child, cache.peek(child)?.recordType ?? this.recordType);
      }
      await this.deleteRecord(identity, this.recordType);

      this.evict(cache.invalidateCascade(identity));
      return [...reachable, identity];
    });
  }

  /**
   * Drops the object's cached graph and loads it again from the store
   */
  refresh(object: T): Promise<T> {
    return this.track('refresh', async () => {
      const identity = this.requireIdentity(object);
      this.evict(this.context.cache.invalidateCascade(identity));
      return this.loadPipeline.loadByIdentity(identity, this.schema);
    });
  }

  load(identity: Identity): Promise<T> {
    return this.track('load', () => this.loadPipeline.loadByIdentity(identity, this.schema));
  }

  loadAll(query: LoadQuery = {}): Promise<LoadPage<T>> {
    return this.track('loadAll', () => this.loadPipeline.loadAll(this.schema, query));
  }

  loadNext(cursor: Cursor, query: LoadQuery = {}): Promise<LoadPage<T>> {
    return this.track('loadNext', () =>
      this.loadPipeline.loadNext(this.schema, cursor, query.limit ?? DEFAULT_PAGE_SIZE, query)
    );
  }

  loadAllExhaustive(query: LoadQuery = {}): Promise<ExhaustiveLoadResult<T>> {
    return this.track('loadAllExhaustive', () =>
      this.loadPipeline.loadAllExhaustive(this.schema, query)
    );
  }

  /**
   * Cold stream of pages; each subscription runs the query again
   */
  pages(query: LoadQuery = {}): Observable<LoadPage<T>> {
    return this.loadPipeline.pages(this.schema, query);
  }

  private requireIdentity(object: T): Identity {
    if (object.identity === undefined) {
      throw new RecordDoesNotExistError(this.recordType);
    }
    return object.identity;
  }

  private reachableFrom(root: Identity): Identity[] {
    const { cache } = this.context;
    const visited = new Set<Identity>([root]);
    const reachable: Identity[] = [];

    const visit = (identity: Identity): void => {
      const record = cache.peek(identity);
      if (!record) {
        return;
      }
      for (const child of referencedIdentities(record)) {
        if (visited.has(child)) continue;
        visited.add(child);
        reachable.push(child);
        visit(child);
      }
    };

    visit(root);
    return reachable;
  }

  private async fetch(identity: Identity): Promise<IdentifiedRecord | null> {
    try {
      return await this.context.store.fetch(identity);
    } catch (error) {
      throw new StoreOperationFailedError('fetch', this.recordType, error);
    }
  }

  private async deleteRecord(identity: Identity, recordType: string): Promise<void> {
    try {
      await this.context.store.delete(identity);
    } catch (error) {
      throw new StoreOperationFailedError('delete', recordType, error);
    }
    this.context.hooks.emit(EngineEventType.RECORD_DELETED, { identity, recordType });
  }

  private evict(identities: Identity[]): void {
    identities.forEach(identity => this.context.cache.invalidate(identity));
    if (identities.length > 0) {
      this.context.hooks.emit(EngineEventType.CACHE_INVALIDATED, identities);
    }
  }

  /**
   * Logs failures of top-level operations before they reach the caller.
   * Timed as a `repository` event when the logger supports it.
   */
  private async track<R>(operation: string, action: () => Promise<R>): Promise<R> {
    const { logger } = this.context;
    logger.debug(`${operation} '${this.recordType}'`);
    try {
      return isTimingLogger(logger)
        ? await logger.measureTime('repository', `${operation}:${this.recordType}`, action)
        : await action();
    } catch (error) {
      if (isError(error)) {
        logger.error(`${operation} failed for '${this.recordType}'`, error);
      } else {
        logger.error(`${operation} failed for '${this.recordType}': ${getErrorMessage(error)}`);
      }
      throw error;
    }
  }
}
