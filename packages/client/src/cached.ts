/**
 * @studycache/client - Memoized derived values
 */

import type { LocalCacheEvents, LocalCacheEventType } from './events';

export interface CachedValueOptions<T> {
  /** Read-only query producing the value */
  compute: () => Promise<T>;
  /** Emitted whenever the value is invalidated */
  event?: LocalCacheEventType;
  events?: LocalCacheEvents;
}

/**
 * A value computed on first read and reused until invalidated.
 *
 * Invalidation never recomputes eagerly. A read that races an invalidation
 * still returns what it computed, but the value stays stale so the next read
 * queries again.
 */
export class CachedValue<T> {
  private stale = true;
  private current: { value: T } | null = null;
  private generation = 0;
  private inflight: Promise<T> | null = null;

  constructor(private readonly options: CachedValueOptions<T>) {}

  get isStale(): boolean {
    return this.stale;
  }

  async get(): Promise<T> {
    if (!this.stale && this.current) {
      return this.current.value;
    }
    if (this.inflight) {
      return this.inflight;
    }

    const generation = this.generation;
    const inflight = this.options.compute().then((value) => {
      if (generation === this.generation) {
        this.current = { value };
        this.stale = false;
      }
      return value;
    });
    this.inflight = inflight;
    try {
      return await inflight;
    } finally {
      if (this.inflight === inflight) {
        this.inflight = null;
      }
    }
  }

  invalidate(): void {
    this.stale = true;
    this.generation += 1;
    this.inflight = null;
    if (this.options.event && this.options.events) {
      this.options.events.emit(this.options.event);
    }
  }
}
