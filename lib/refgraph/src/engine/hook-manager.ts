import {
  EngineEventHandlers,
  EngineEventType,
  IHookManager,
  UnsubscribeFn,
} from '../types/engine-hooks';
import type { ILogger } from '../types/logger';
import { LoggerManager } from '../utils/logging';
import { getErrorMessage, isError } from '../utils/persistence-error';

// Type for any event handler - union of all possible event handlers
type AnyEventHandler = EngineEventHandlers[keyof EngineEventHandlers];

/**
 * Hook manager for engine.
 * Provides ability to register/cancel hooks and support for multiple handlers.
 * A throwing handler is logged and never interrupts the operation that emitted.
 */
export class HookManager implements IHookManager {
  private readonly handlers = new Map<keyof EngineEventHandlers, Set<AnyEventHandler>>();

  constructor(private readonly logger: ILogger = LoggerManager.getInstance().getLogger()) {
    Object.values(EngineEventType).forEach(eventType => {
      this.handlers.set(eventType, new Set());
    });
  }

  /**
   * Registers handler for specified event
   * @returns Function to cancel registration
   */
  public on<K extends keyof EngineEventHandlers>(
    eventType: K,
    handler: EngineEventHandlers[K]
  ): UnsubscribeFn {
    const handlers = this.handlers.get(eventType);

    if (!handlers) {
      this.logger.warn(`Attempt to subscribe to unknown event: ${String(eventType)}`);
      return () => undefined;
    }

    handlers.add(handler);

    return () => {
      handlers.delete(handler);
    };
  }

  /**
   * Calls all handlers for specified event
   */
  public emit<K extends keyof EngineEventHandlers>(
    eventType: K,
    ...args: Parameters<EngineEventHandlers[K]>
  ): void {
    const handlers = this.handlers.get(eventType);

    if (!handlers || handlers.size === 0) {
      return;
    }

    handlers.forEach(handler => {
      try {
        Reflect.apply(handler, undefined, args);
      } catch (error) {
        this.logger.error(
          `Error in event handler ${String(eventType)}: ${getErrorMessage(error)}`,
          isError(error) ? error : undefined
        );
      }
    });
  }

  /**
   * Cancels all subscriptions to specified event
   */
  public clearEvent(eventType: keyof EngineEventHandlers): void {
    this.handlers.get(eventType)?.clear();
  }

  /**
   * Cancels all subscriptions to all events
   */
  public clearAllEvents(): void {
    this.handlers.forEach(handlers => handlers.clear());
  }

  /**
   * Checks if there are handlers for specified event
   */
  public hasHandlers(eventType: keyof EngineEventHandlers): boolean {
    const handlers = this.handlers.get(eventType);
    return !!handlers && handlers.size > 0;
  }
}
