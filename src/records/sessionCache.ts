export interface SessionCacheOptions {
  /** Snapshot lifetime; `0` disables caching. */
  ttlMs?: number;
  clock?: () => number;
}

const DEFAULT_TTL_MS = 600_000;

/**
 * Read-through cache over a single snapshot. There is no per-key state: any
 * `invalidate()` drops everything, including the result of a load that was
 * still in flight when it was called.
 */
export class SessionCache<T> {
  private readonly ttlMs: number;
  private readonly clock: () => number;
  private entry: { value: T; storedAt: number } | null = null;
  private loading: Promise<T> | null = null;
  private generation = 0;

  constructor(options: SessionCacheOptions = {}) {
    this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_TTL_MS);
    this.clock = options.clock ?? Date.now;
  }

  async get(loader: () => Promise<T>): Promise<T> {
    if (this.entry && this.clock() - this.entry.storedAt < this.ttlMs) {
      return this.entry.value;
    }
    if (!this.loading) {
      const generation = this.generation;
      const load: Promise<T> = loader()
        .then((value) => {
          if (generation === this.generation && this.ttlMs > 0) {
            this.entry = { value, storedAt: this.clock() };
          }
          return value;
        })
        .finally(() => {
          if (this.loading === load) this.loading = null;
        });
      this.loading = load;
    }
    return this.loading;
  }

  invalidate(): void {
    this.generation += 1;
    this.entry = null;
    this.loading = null;
  }

  get isWarm(): boolean {
    return this.entry !== null && this.clock() - this.entry.storedAt < this.ttlMs;
  }
}
