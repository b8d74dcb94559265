import { createHash } from 'node:crypto';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { CacheOutcome, RenderMode, VariableMap } from './types.js';

/**
 * Render Cache
 *
 * Process-wide cache of global + cacheable render results. Properties:
 *
 * - Single-flight: concurrent callers for one key share one computation.
 *   Callers on different keys never wait on each other.
 * - LRU: bounded by entry count and optionally by bytes; the least recently
 *   accessed entry goes first.
 * - Version-keyed: the content version is part of the key. Storing a newer
 *   version for a (collection, article, mode) slot drops that slot's older
 *   entries; any other stale key simply ages out.
 * - Failed computations are never stored.
 */

export interface CacheKey {
  collectionId: number | null;
  articleId: number;
  mode: RenderMode;
  /** Version token, `<content>.<variables>` */
  version: string;
  /** Hash of the cacheable variable set */
  signature: string;
}

export interface RenderCacheOptions<V> {
  maxEntries: number;
  maxBytes?: number;
  sizeOf?: (value: V) => number;
  now?: () => number;
  logger?: Logger;
}

export interface CacheStats {
  entries: number;
  bytes: number;
  inflight: number;
  hits: number;
  misses: number;
  coalesced: number;
  evictions: number;
  invalidations: number;
}

interface CacheEntry<V> {
  value: V;
  slot: string;
  version: string;
  bytes: number;
  createdAt: number;
  lastAccess: number;
}

// ============================================
// Keys
// ============================================

/**
 * Stable signature of a variable set: independent of key order
 */
export function signVariables(vars: VariableMap = {}): string {
  const canonical = JSON.stringify(
    Object.keys(vars)
      .sort()
      .map(tag => [tag, vars[tag]])
  );
  return createHash('sha256').update(canonical).digest('hex').slice(0, 16);
}

export function formatVersionToken(contentVersion: number, variablesVersion: number): string {
  return `${contentVersion}.${variablesVersion}`;
}

/**
 * Compare two version tokens component by component.
 * Returns a negative number when `a` is older than `b`.
 */
export function compareVersionTokens(a: string, b: string): number {
  const left = a.split('.').map(Number);
  const right = b.split('.').map(Number);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function slotOf(key: CacheKey): string {
  return `${key.collectionId ?? '-'}/${key.articleId}/${key.mode}`;
}

export function formatCacheKey(key: CacheKey): string {
  return `${slotOf(key)}@${key.version}#${key.signature}`;
}

// ============================================
// Cache
// ============================================

function defaultSizeOf(value: unknown): number {
  try {
    return Buffer.byteLength(JSON.stringify(value) ?? '', 'utf-8');
  } catch {
    return 0;
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Render aborted');
}

export class RenderCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly slots = new Map<string, Set<string>>();
  private readonly inflight = new Map<string, Promise<V>>();
  private readonly maxEntries: number;
  private readonly maxBytes: number | undefined;
  private readonly sizeOf: (value: V) => number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private bytes = 0;
  private hits = 0;
  private misses = 0;
  private coalesced = 0;
  private evictions = 0;
  private invalidations = 0;

  constructor(options: RenderCacheOptions<V>) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new Error(`Render cache capacity must be a positive integer, got ${options.maxEntries}`);
    }
    this.maxEntries = options.maxEntries;
    this.maxBytes = options.maxBytes;
    this.sizeOf = options.sizeOf ?? defaultSizeOf;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Return the cached value for a key, or compute it once.
   *
   * A caller that passes an aborted (or later aborting) signal stops waiting;
   * the computation keeps running for everyone else and is still stored.
   */
  async getOrCompute(
    key: CacheKey,
    compute: () => Promise<V>,
    options: { signal?: AbortSignal } = {}
  ): Promise<{ value: V; outcome: CacheOutcome }> {
    const id = formatCacheKey(key);
    if (options.signal?.aborted) {
      throw abortReason(options.signal);
    }

    const entry = this.entries.get(id);
    if (entry) {
      this.hits++;
      this.touch(id, entry);
      return { value: entry.value, outcome: 'hit' };
    }

    let outcome: CacheOutcome;
    let pending = this.inflight.get(id);
    if (pending) {
      this.coalesced++;
      outcome = 'coalesced';
    } else {
      this.misses++;
      outcome = 'miss';
      pending = this.run(id, key, compute);
      this.inflight.set(id, pending);
    }

    const value = await this.waitFor(pending, options.signal);
    return { value, outcome };
  }

  peek(key: CacheKey): V | undefined {
    return this.entries.get(formatCacheKey(key))?.value;
  }

  has(key: CacheKey): boolean {
    return this.entries.has(formatCacheKey(key));
  }

  /** Entry metadata, for inspection */
  describe(key: CacheKey): Omit<CacheEntry<V>, 'value'> | undefined {
    const entry = this.entries.get(formatCacheKey(key));
    if (!entry) return undefined;
    return {
      slot: entry.slot,
      version: entry.version,
      bytes: entry.bytes,
      createdAt: entry.createdAt,
      lastAccess: entry.lastAccess,
    };
  }

  clear(): void {
    this.entries.clear();
    this.slots.clear();
    this.bytes = 0;
  }

  stats(): CacheStats {
    return {
      entries: this.entries.size,
      bytes: this.bytes,
      inflight: this.inflight.size,
      hits: this.hits,
      misses: this.misses,
      coalesced: this.coalesced,
      evictions: this.evictions,
      invalidations: this.invalidations,
    };
  }

  private run(id: string, key: CacheKey, compute: () => Promise<V>): Promise<V> {
    const pending = Promise.resolve()
      .then(() => compute())
      .then(value => {
        this.store(id, key, value);
        return value;
      })
      .finally(() => {
        this.inflight.delete(id);
      });

    // Waiters that aborted no longer observe this promise
    pending.catch((error: unknown) => {
      this.logger.debug(
        `Render cache computation for ${id} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    });
    return pending;
  }

  private waitFor(pending: Promise<V>, signal?: AbortSignal): Promise<V> {
    if (!signal) {
      return pending;
    }

    return new Promise<V>((resolve, reject) => {
      const onAbort = () => reject(abortReason(signal));
      signal.addEventListener('abort', onAbort, { once: true });
      pending.then(
        value => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private store(id: string, key: CacheKey, value: V): void {
    const slot = slotOf(key);
    const siblings = this.slots.get(slot) ?? new Set<string>();

    for (const siblingId of siblings) {
      const sibling = this.entries.get(siblingId);
      if (sibling && compareVersionTokens(sibling.version, key.version) > 0) {
        // A newer version of this slot is already cached; this result is stale
        this.logger.debug(`Render cache skipped stale result ${id}`);
        return;
      }
    }

    for (const siblingId of [...siblings]) {
      const sibling = this.entries.get(siblingId);
      if (sibling && compareVersionTokens(sibling.version, key.version) < 0) {
        this.remove(siblingId);
        this.invalidations++;
      }
    }

    const bytes = this.sizeOf(value);
    if (this.maxBytes !== undefined && bytes > this.maxBytes) {
      this.logger.debug(`Render cache skipped ${id}: ${bytes} bytes exceeds capacity ${this.maxBytes}`);
      return;
    }

    const now = this.now();
    this.remove(id);
    this.entries.set(id, { value, slot, version: key.version, bytes, createdAt: now, lastAccess: now });
    siblings.add(id);
    this.slots.set(slot, siblings);
    this.bytes += bytes;
    this.evictOverflow();
  }

  private touch(id: string, entry: CacheEntry<V>): void {
    entry.lastAccess = this.now();
    // Map iteration order is insertion order; re-inserting marks most recent
    this.entries.delete(id);
    this.entries.set(id, entry);
  }

  private evictOverflow(): void {
    while (
      this.entries.size > this.maxEntries ||
      (this.maxBytes !== undefined && this.bytes > this.maxBytes)
    ) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.remove(oldest.value);
      this.evictions++;
      this.logger.debug(`Render cache evicted ${oldest.value}`);
    }
  }

  private remove(id: string): void {
    const entry = this.entries.get(id);
    if (!entry) return;
    this.entries.delete(id);
    this.bytes -= entry.bytes;
    const siblings = this.slots.get(entry.slot);
    if (siblings) {
      siblings.delete(id);
      if (siblings.size === 0) this.slots.delete(entry.slot);
    }
  }
}
