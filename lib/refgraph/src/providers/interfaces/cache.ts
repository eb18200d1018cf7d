import type { Identity, IdentifiedRecord } from '../../types/record';

/**
 * Record cache provider interface
 *
 * Methods are synchronous and never yield, so every call runs to completion
 * before another save or load can touch the cache.
 * @category Providers
 */
export interface IRecordCacheProvider {
  /**
   * Returns the record while it is younger than the TTL.
   * Expired entries are dropped and reported as a miss.
   */
  get(identity: Identity): IdentifiedRecord | undefined;

  /**
   * Returns the entry regardless of age, without touching statistics
   */
  peek(identity: Identity): IdentifiedRecord | undefined;

  /**
   * Returns the record while it is younger than the TTL, without touching
   * statistics or dropping expired entries
   */
  peekFresh(identity: Identity): IdentifiedRecord | undefined;

  put(record: IdentifiedRecord): void;

  putMany(records: readonly IdentifiedRecord[]): void;

  /**
   * Removes a single entry
   * @returns true if an entry was removed
   */
  invalidate(identity: Identity): boolean;

  /**
   * Removes the entry and every identity reachable through cached reference fields.
   * Never fetches.
   * @returns Removed identities in visiting order
   */
  invalidateCascade(identity: Identity): Identity[];

  /**
   * Identities referenced by the cached entry (single and list references)
   */
  childReferences(identity: Identity): Identity[];

  /**
   * Drops expired entries
   * @returns Number of removed entries
   */
  cleanup(): number;

  clear(): void;

  /**
   * Clears the cache and rejects further writes
   */
  close(): void;

  getStats(): CacheStats;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  hitRatio: number;
  size: number;
  maxSize: number;
}
