import type { IRecordCacheProvider, CacheStats } from '../interfaces/cache';
import type { Identity, IdentifiedRecord } from '../../types/record';
import { referencedIdentities } from '../../types/record';

/**
 * Options of the in-memory record cache
 */
export interface MemoryRecordCacheOptions {
  /**
   * Entry time-to-live in seconds
   * @default 30
   */
  ttl?: number;

  /**
   * Advisory size limit, oldest entry is evicted first. 0 disables the limit.
   * @default 1000
   */
  maxEntries?: number;

  /**
   * Millisecond clock, replaceable in tests
   */
  clock?: () => number;
}

interface CacheEntry {
  readonly record: IdentifiedRecord;
  readonly insertedAt: number;
}

/**
 * In-memory record cache with TTL and cascade invalidation
 * Map insertion order doubles as age order for eviction.
 * @category Providers
 */
export class MemoryRecordCache implements IRecordCacheProvider {
  private readonly entries = new Map<Identity, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly clock: () => number;
  private closed = false;
  private readonly stats: CacheStats;

  constructor(options: MemoryRecordCacheOptions = {}) {
    this.ttlMs = (options.ttl ?? 30) * 1000;
    this.maxEntries = options.maxEntries ?? 1000;
    this.clock = options.clock ?? Date.now;
    this.stats = { hits: 0, misses: 0, hitRatio: 0, size: 0, maxSize: this.maxEntries };
  }

  get(identity: Identity): IdentifiedRecord | undefined {
    const entry = this.entries.get(identity);

    if (!entry) {
      this.stats.misses++;
      this.updateHitRatio();
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(identity);
      this.stats.misses++;
      this.stats.size = this.entries.size;
      this.updateHitRatio();
      return undefined;
    }

    this.stats.hits++;
    this.updateHitRatio();
    return entry.record;
  }

  peek(identity: Identity): IdentifiedRecord | undefined {
    return this.entries.get(identity)?.record;
  }

  peekFresh(identity: Identity): IdentifiedRecord | undefined {
    const entry = this.entries.get(identity);
    return entry && !this.isExpired(entry) ? entry.record : undefined;
  }

  put(record: IdentifiedRecord): void {
    if (this.closed) {
      return;
    }

    // Re-inserting moves the entry to the young end
    this.entries.delete(record.identity);

    if (this.maxEntries > 0 && this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(record.identity, { record, insertedAt: this.clock() });
    this.stats.size = this.entries.size;
  }

  putMany(records: readonly IdentifiedRecord[]): void {
    records.forEach(record => this.put(record));
  }

  invalidate(identity: Identity): boolean {
    const removed = this.entries.delete(identity);
    this.stats.size = this.entries.size;
    return removed;
  }

  invalidateCascade(identity: Identity): Identity[] {
    const removed: Identity[] = [];
    const visited = new Set<Identity>();

    const visit = (current: Identity): void => {
      if (visited.has(current)) {
        return;
      }
      visited.add(current);

      const entry = this.entries.get(current);
      if (!entry) {
        return;
      }
      this.entries.delete(current);
      removed.push(current);
      referencedIdentities(entry.record).forEach(visit);
    };

    visit(identity);
    this.stats.size = this.entries.size;
    return removed;
  }

  childReferences(identity: Identity): Identity[] {
    const entry = this.entries.get(identity);
    return entry ? referencedIdentities(entry.record) : [];
  }

  cleanup(): number {
    let removed = 0;
    for (const [identity, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(identity);
        removed++;
      }
    }
    this.stats.size = this.entries.size;
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.stats.size = 0;
    this.stats.hits = 0;
    this.stats.misses = 0;
    this.stats.hitRatio = 0;
  }

  close(): void {
    this.clear();
    this.closed = true;
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.clock() - entry.insertedAt >= this.ttlMs;
  }

  private updateHitRatio(): void {
    const total = this.stats.hits + this.stats.misses;
    this.stats.hitRatio = total > 0 ? this.stats.hits / total : 0;
  }
}
