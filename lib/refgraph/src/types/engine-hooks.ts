import type { Identity } from './record';
import type { PersistenceError } from '../utils/persistence-error';

/**
 * Types of all engine events
 */
export enum EngineEventType {
  RECORD_SAVED = 'recordSaved',
  RECORD_LOADED = 'recordLoaded',
  RECORD_DELETED = 'recordDeleted',

  // Save pipeline decisions
  REFERENCE_DEFERRED = 'referenceDeferred',
  REFERENCE_SKIPPED = 'referenceSkipped',

  PARTIAL_ERROR = 'partialError',
  CACHE_INVALIDATED = 'cacheInvalidated',
}

/**
 * Origin of a loaded record
 */
export type LoadSource = 'cache' | 'store';

/**
 * Handler type for each event
 */
export interface EngineEventHandlers {
  /**
   * `patched` is true for the second write of a two-phase save
   */
  [EngineEventType.RECORD_SAVED]: (data: {
    identity: Identity;
    recordType: string;
    patched: boolean;
  }) => void;
  [EngineEventType.RECORD_LOADED]: (data: {
    identity: Identity;
    recordType: string;
    source: LoadSource;
  }) => void;
  [EngineEventType.RECORD_DELETED]: (data: { identity: Identity; recordType: string }) => void;
  [EngineEventType.REFERENCE_DEFERRED]: (data: { recordType: string; field: string }) => void;
  [EngineEventType.REFERENCE_SKIPPED]: (data: { recordType: string; field: string }) => void;
  [EngineEventType.PARTIAL_ERROR]: (data: {
    identity: Identity;
    recordType: string;
    error: PersistenceError;
  }) => void;
  [EngineEventType.CACHE_INVALIDATED]: (identities: Identity[]) => void;
}

/**
 * Function type for hook unregistration
 */
export type UnsubscribeFn = () => void;

/**
 * Interface for hook management
 */
export interface IHookManager {
  /**
   * Subscribe to event with cancellation capability
   * @returns Function to unsubscribe
   */
  on<K extends keyof EngineEventHandlers>(
    eventType: K,
    handler: EngineEventHandlers[K]
  ): UnsubscribeFn;

  /**
   * Call all handlers for specified event
   */
  emit<K extends keyof EngineEventHandlers>(
    eventType: K,
    ...args: Parameters<EngineEventHandlers[K]>
  ): void;

  /**
   * Cancel all subscriptions to specified event
   */
  clearEvent(eventType: keyof EngineEventHandlers): void;

  /**
   * Cancel all subscriptions to all events
   */
  clearAllEvents(): void;
}
