import { PathCacheOptions, PathCacheStats, PathToken } from './types';
import { CacheOptionsValidator } from '../utils/cache-options-validator';

/**
 * Memoizes token sequences by their exact, untrimmed path string.
 *
 * Unbounded by default. With `maxEntries` set, the least recently used
 * path is evicted once the limit is reached.
 */
export class PathCache {
  private readonly entries = new Map<string, readonly PathToken[]>();
  private readonly maxEntries: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options?: PathCacheOptions) {
    this.maxEntries = CacheOptionsValidator.validate(options).maxEntries;
  }

  /**
   * Return the cached tokens for `path`, parsing and storing them on first use.
   * An existing entry is never replaced.
   */
  getOrAdd(path: string, parse: (path: string) => readonly PathToken[]): readonly PathToken[] {
    const cached = this.entries.get(path);
    if (cached !== undefined) {
      this.hits++;
      if (this.maxEntries > 0) {
        // Move to the back of the insertion order
        this.entries.delete(path);
        this.entries.set(path, cached);
      }
      return cached;
    }

    this.misses++;
    const tokens = parse(path);
    if (this.maxEntries > 0 && this.entries.size >= this.maxEntries) {
      this.evictOldest();
    }
    this.entries.set(path, tokens);
    return tokens;
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  get size(): number {
    return this.entries.size;
  }

  get limit(): number {
    return this.maxEntries;
  }

  stats(): PathCacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }
}
