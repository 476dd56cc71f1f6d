// In-memory cache of resolved commit SHAs, keyed by `repository@locator`

/**
 * Cache statistics
 */
export interface ResolutionCacheStats {
  size: number;
  hits: number;
  misses: number;
}

/**
 * Process-lifetime cache of successful resolutions.
 *
 * Entries are never invalidated or re-checked within a run, and failures are
 * never stored. The first value written for a key wins; later writes for the
 * same key return the stored value instead of replacing it.
 */
export class ResolutionCache {
  private entries: Map<string, string> = new Map();
  private hits = 0;
  private misses = 0;

  /**
   * Gets the cached SHA for a key, counting the lookup as a hit or miss
   */
  get(key: string): string | undefined {
    const sha = this.entries.get(key);
    if (sha === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return sha;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Stores a SHA unless the key is already present; returns the value now cached
   */
  setIfAbsent(key: string, sha: string): string {
    const existing = this.entries.get(key);
    if (existing !== undefined) {
      return existing;
    }
    this.entries.set(key, sha);
    return sha;
  }

  /**
   * Gets cache statistics
   */
  getStats(): ResolutionCacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses
    };
  }
}
