import type { RecordCodec } from '../codec/record-codec';
import type { CycleDetector } from '../graph/cycle-detector';
import type { ObjectArena } from '../graph/object-arena';
import type { IRecordCacheProvider } from '../providers/interfaces/cache';
import type { IRecordStore } from '../providers/interfaces/record-store';
import type { IHookManager } from '../types/engine-hooks';
import type { ILogger } from '../types/logger';
import type { IFieldIntrospector } from '../types/model';
import type { ResolvedPersistenceOptions } from '../types/persistence-options';

/**
 * Collaborators shared by the save and load pipelines of one engine
 */
export interface PipelineContext {
  readonly store: IRecordStore;
  readonly cache: IRecordCacheProvider;
  readonly codec: RecordCodec;
  readonly introspector: IFieldIntrospector;
  readonly arena: ObjectArena;
  readonly detector: CycleDetector;
  readonly hooks: IHookManager;
  readonly logger: ILogger;
  readonly options: ResolvedPersistenceOptions;
}
