/**
 * DecodeCache: memoizes decoded asset bytes by logical path.
 *
 * Populate-on-miss, no eviction besides clear(). Concurrent requests for the
 * same path share one in-flight decode; requests for different paths never
 * wait on each other.
 */

export interface DecodeCacheStats {
  /** Served from a completed entry. */
  hits: number;
  /** Joined or started a decode. */
  misses: number;
  /** Decodes actually started. */
  decodes: number;
}

export class DecodeCache {
  private readonly entries = new Map<string, Uint8Array>();

  /** In-flight deduplication: path → pending decode. */
  private readonly inflight = new Map<string, Promise<Uint8Array>>();

  /** Bumped by clear() so decodes started earlier do not repopulate. */
  private generation = 0;

  private counters: DecodeCacheStats = { hits: 0, misses: 0, decodes: 0 };

  /**
   * Return the cached bytes for `path`, or run `decode` once and cache the
   * result. A failed decode is not cached and rejects every waiter.
   */
  getOrDecode(path: string, decode: () => Promise<Uint8Array>): Promise<Uint8Array> {
    const cached = this.entries.get(path);
    if (cached) {
      this.counters.hits++;
      return Promise.resolve(cached);
    }

    this.counters.misses++;
    const existing = this.inflight.get(path);
    if (existing) return existing;

    this.counters.decodes++;
    const generation = this.generation;
    const promise = decode()
      .then((bytes) => {
        if (generation === this.generation) {
          this.entries.set(path, bytes);
        }
        return bytes;
      })
      .finally(() => {
        if (this.inflight.get(path) === promise) {
          this.inflight.delete(path);
        }
      });

    this.inflight.set(path, promise);
    return promise;
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  /** Number of cached paths. */
  get size(): number {
    return this.entries.size;
  }

  /** Total bytes held by cached entries. */
  get byteLength(): number {
    let total = 0;
    for (const bytes of this.entries.values()) {
      total += bytes.byteLength;
    }
    return total;
  }

  stats(): DecodeCacheStats {
    return { ...this.counters };
  }

  /**
   * Drop every entry. Decodes already in flight still settle for their
   * waiters, but their results are not kept.
   */
  clear(): void {
    this.entries.clear();
    this.inflight.clear();
    this.generation++;
  }
}
