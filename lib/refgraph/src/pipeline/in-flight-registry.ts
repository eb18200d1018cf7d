/**
 * A running build and what its owner attached to it
 */
export interface InFlightEntry<V, M> {
  readonly promise: Promise<V>;
  readonly meta: M;
}

/**
 * At-most-once execution per key: callers arriving while a build for the
 * same key is running share its promise
 */
export class InFlightRegistry<V, M = void> {
  private readonly inFlight = new Map<string, InFlightEntry<V, M>>();

  run(key: string, build: () => Promise<V>, meta: M): Promise<V> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing.promise;
    }

    const promise = build().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, { promise, meta });
    return promise;
  }

  get(key: string): InFlightEntry<V, M> | undefined {
    return this.inFlight.get(key);
  }

  has(key: string): boolean {
    return this.inFlight.has(key);
  }

  get size(): number {
    return this.inFlight.size;
  }
}
