import NodeCache from 'node-cache';

export interface ReadThroughCacheHooks {
  onHit?(key: string): void;
  onMiss?(key: string): void;
}

/**
 * Unbounded, TTL-less cache populated on miss. `undefined` marks a miss, so
 * it cannot be cached as a value; `null` can.
 *
 * Concurrent misses for a key share one load. A load that was in flight when
 * its key got invalidated still resolves for its callers but is not stored.
 */
export class ReadThroughCache<T> {
  private readonly entries = new NodeCache({
    stdTTL: 0,
    checkperiod: 0,
    useClones: false,
  });
  private readonly inFlight = new Map<string, Promise<T>>();

  constructor(
    readonly name: string,
    private readonly hooks: ReadThroughCacheHooks = {},
  ) {}

  get(key: string): T | undefined {
    return this.entries.get<T>(key);
  }

  put(key: string, value: T): void {
    this.entries.set(key, value);
  }

  invalidate(key: string): void {
    this.entries.del(key);
    this.inFlight.delete(key);
  }

  invalidatePrefix(prefix: string): void {
    const cachedKeys = this.entries.keys().filter((key) => key.startsWith(prefix));
    this.entries.del(cachedKeys);

    for (const key of [...this.inFlight.keys()]) {
      if (key.startsWith(prefix)) {
        this.inFlight.delete(key);
      }
    }
  }

  async getOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      this.hooks.onHit?.(key);
      return cached;
    }
    this.hooks.onMiss?.(key);

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const load: Promise<T> = loader()
      .then((value) => {
        if (this.inFlight.get(key) === load) {
          this.put(key, value);
        }
        return value;
      })
      .finally(() => {
        if (this.inFlight.get(key) === load) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, load);
    return load;
  }

  size(): number {
    return this.entries.keys().length;
  }

  close(): void {
    this.entries.flushAll();
    this.entries.close();
    this.inFlight.clear();
  }
}
