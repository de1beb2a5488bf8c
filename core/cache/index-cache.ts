/**
 * Modification-time keyed cache for parsed index views
 *
 * Each entry belongs to one file path and remembers the modification time
 * it was computed for. An entry holds several named slots (for example the
 * multi-provider and the single-provider view of the same file). Reading
 * with a different modification time drops every slot of that path.
 *
 * The number of paths is bounded; when full, the least recently used path
 * is evicted.
 *
 * @module core/cache/index-cache
 */

/**
 * Configuration options for the index cache.
 */
export interface IndexCacheOptions {
  /**
   * Maximum number of paths kept.
   * @default 64
   */
  maxSize?: number

  /**
   * Called when a path is dropped, either because its file changed or
   * because the cache was full.
   */
  onEvict?: (path: string, reason: 'stale' | 'capacity' | 'cleared') => void
}

/**
 * Cache statistics for monitoring and debugging.
 */
export interface IndexCacheStats {
  /** Lookups answered from the cache */
  hits: number
  /** Lookups with no usable slot */
  misses: number
  /** Paths dropped because the file's modification time changed */
  invalidations: number
  /** Paths dropped because the cache was full */
  evictions: number
  /** Current number of paths */
  count: number
  /** Hit rate as percentage (0-100) */
  hitRate: number
}

interface Entry<S> {
  mtimeMs: number
  slots: Partial<S>
}

/**
 * @example
 * ```typescript
 * const cache = new IndexCache<{ multiple: ProviderIndex; single: InstalledIndex }>()
 *
 * const hit = cache.get(path, stat.mtimeMs, 'multiple')
 * if (!hit) cache.set(path, stat.mtimeMs, 'multiple', parsed)
 * ```
 */
export class IndexCache<S extends object> {
  // Map iteration order doubles as recency order, oldest first
  private entries: Map<string, Entry<S>> = new Map()

  private _maxSize: number
  private _hits = 0
  private _misses = 0
  private _invalidations = 0
  private _evictions = 0
  private _onEvict: IndexCacheOptions['onEvict']

  constructor(options?: IndexCacheOptions) {
    this._maxSize = options?.maxSize ?? 64
    this._onEvict = options?.onEvict
  }

  /**
   * Number of cached paths.
   */
  get size(): number {
    return this.entries.size
  }

  /**
   * Look up a slot. A stale entry (other modification time) is dropped
   * and counts as a miss.
   */
  get<K extends keyof S>(path: string, mtimeMs: number, slot: K): S[K] | undefined {
    const entry = this.fresh(path, mtimeMs)
    const value = entry?.slots[slot]

    if (!entry || value === undefined) {
      this._misses++
      return undefined
    }

    this.touch(path, entry)
    this._hits++
    return value
  }

  /**
   * Store a slot for the given modification time. Slots recorded for a
   * different modification time are dropped first.
   */
  set<K extends keyof S>(path: string, mtimeMs: number, slot: K, value: S[K]): void {
    let entry = this.fresh(path, mtimeMs)

    if (!entry) {
      if (this.entries.size >= this._maxSize) {
        this.evictOldest()
      }
      entry = { mtimeMs, slots: {} }
    }

    entry.slots[slot] = value
    this.touch(path, entry)
  }

  /**
   * Whether any slot is cached for the path, regardless of age.
   */
  has(path: string): boolean {
    return this.entries.has(path)
  }

  /**
   * Drop every slot of a path.
   *
   * @returns true if something was cached
   */
  delete(path: string): boolean {
    if (!this.entries.delete(path)) {
      return false
    }
    this._onEvict?.(path, 'cleared')
    return true
  }

  /**
   * Drop everything.
   */
  clear(): void {
    for (const path of this.entries.keys()) {
      this._onEvict?.(path, 'cleared')
    }
    this.entries.clear()
  }

  /**
   * Cached paths, least recently used first.
   */
  keys(): string[] {
    return [...this.entries.keys()]
  }

  getStats(): IndexCacheStats {
    const total = this._hits + this._misses
    const hitRate = total === 0 ? 0 : Math.round((this._hits / total) * 100)

    return {
      hits: this._hits,
      misses: this._misses,
      invalidations: this._invalidations,
      evictions: this._evictions,
      count: this.entries.size,
      hitRate,
    }
  }

  resetStats(): void {
    this._hits = 0
    this._misses = 0
    this._invalidations = 0
    this._evictions = 0
  }

  /**
   * Entry for the path if it matches the modification time. A mismatching
   * entry is removed.
   */
  private fresh(path: string, mtimeMs: number): Entry<S> | undefined {
    const entry = this.entries.get(path)
    if (!entry) return undefined
    if (entry.mtimeMs === mtimeMs) return entry

    this.entries.delete(path)
    this._invalidations++
    this._onEvict?.(path, 'stale')
    return undefined
  }

  private touch(path: string, entry: Entry<S>): void {
    this.entries.delete(path)
    this.entries.set(path, entry)
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next()
    if (oldest.done) return

    this.entries.delete(oldest.value)
    this._evictions++
    this._onEvict?.(oldest.value, 'capacity')
  }
}
