import type { PersistenceDefinition } from '../build/operator-types';
import { RecordCodec } from '../codec/record-codec';
import { CycleDetector } from '../graph/cycle-detector';
import { ObjectArena } from '../graph/object-arena';
import { SchemaFieldIntrospector } from '../model/schema-introspector';
import { LoadPipeline } from '../pipeline/load-pipeline';
import type { PipelineContext } from '../pipeline/pipeline-context';
import { SavePipeline } from '../pipeline/save-pipeline';
import type { CacheStats } from '../providers/interfaces/cache';
import { MemoryRecordCache } from '../providers/memory/cache';
import type { EngineEventHandlers, UnsubscribeFn } from '../types/engine-hooks';
import { EngineEventType } from '../types/engine-hooks';
import type { ModelSchema, Persistable } from '../types/model';
import type { ResolvedPersistenceOptions } from '../types/persistence-options';
import { resolvePersistenceOptions } from '../types/persistence-options';
import type { Identity } from '../types/record';
import { LoggerManager } from '../utils/logging';
import { HookManager } from './hook-manager';
import { Repository } from './repository';

/**
 * Engine assembled by createPersistence.
 * Owns the record cache, the pipelines and the event hooks; hands out one
 * repository per model schema.
 */
export class PersistenceEngine {
  private readonly context: PipelineContext;
  private readonly hooks: HookManager;
  private readonly savePipeline: SavePipeline;
  private readonly loadPipeline: LoadPipeline;
  private isClosed = false;

  constructor(definition: PersistenceDefinition) {
    const { providers } = definition;
    if (!providers.store) {
      throw new Error('createPersistence: a record store is required (use withRecordStore)');
    }

    const options = resolvePersistenceOptions(definition.options);
    const logger = providers.logger ?? LoggerManager.getInstance().getLogger();
    if (options.logLevel !== undefined) {
      logger.setLevel(options.logLevel);
    }

    const introspector = providers.introspector ?? new SchemaFieldIntrospector();
    const arena = new ObjectArena();
    this.hooks = new HookManager(logger);

    this.context = {
      store: providers.store,
      cache:
        providers.cache ??
        new MemoryRecordCache({ ttl: options.cacheTtl, maxEntries: options.cacheMaxEntries }),
      codec: new RecordCodec(),
      introspector,
      arena,
      detector: new CycleDetector(arena, introspector),
      hooks: this.hooks,
      logger,
      options,
    };
    this.savePipeline = new SavePipeline(this.context);
    this.loadPipeline = new LoadPipeline(this.context);

    logger.debug(
      `Persistence engine ready (cacheTtl=${options.cacheTtl}s, identifiers=${options.identifierStrategy.kind})`
    );
  }

  /**
   * Returns a repository for a model. Repositories are stateless views over
   * the shared pipelines.
   */
  repository<T extends Persistable>(schema: ModelSchema<T>): Repository<T> {
    if (this.isClosed) {
      throw new Error('Persistence engine has been closed');
    }
    return new Repository(schema, this.context, this.savePipeline, this.loadPipeline);
  }

  /**
   * Subscribes to an engine event
   * @returns Function to unsubscribe
   */
  on<K extends keyof EngineEventHandlers>(eventType: K, handler: EngineEventHandlers[K]): UnsubscribeFn {
    return this.hooks.on(eventType, handler);
  }

  /**
   * Evicts a record and everything reachable from it through cached references
   * @returns Evicted identities
   */
  invalidate(identity: Identity): Identity[] {
    const removed = this.context.cache.invalidateCascade(identity);
    if (removed.length > 0) {
      this.hooks.emit(EngineEventType.CACHE_INVALIDATED, removed);
    }
    return removed;
  }

  /**
   * Drops expired cache entries
   * @returns Number of removed entries
   */
  cleanupCache(): number {
    return this.context.cache.cleanup();
  }

  getCacheStats(): CacheStats {
    return this.context.cache.getStats();
  }

  get options(): ResolvedPersistenceOptions {
    return this.context.options;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Closes the cache and removes every event handler
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.context.cache.close();
    this.hooks.clearAllEvents();
    this.isClosed = true;
  }
}
