/**
 * @studycache/client - Change notifications
 *
 * Listeners are always called on a later tick than the one that emitted the
 * event, so by the time they run the write that caused it has committed.
 */

import { captureCacheException } from '@studycache/core';

export type LocalCacheEventType =
  | 'unauthorized'
  | 'availableItemsChanged'
  | 'pendingItemsChanged'
  | 'userInfoChanged'
  | 'srsCategoryCountsChanged';

export interface LocalCacheEvent {
  type: LocalCacheEventType;
  timestamp: number;
}

export type LocalCacheEventListener = (event: LocalCacheEvent) => void;

export class LocalCacheEvents {
  private listeners = new Map<LocalCacheEventType, Set<LocalCacheEventListener>>();

  on(type: LocalCacheEventType, listener: LocalCacheEventListener): () => void {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);

    return () => {
      this.listeners.get(type)?.delete(listener);
    };
  }

  emit(type: LocalCacheEventType): void {
    const event: LocalCacheEvent = { type, timestamp: Date.now() };
    setImmediate(() => {
      const listeners = this.listeners.get(type);
      if (!listeners) return;
      for (const listener of listeners) {
        try {
          listener(event);
        } catch (err) {
          captureCacheException(err, { event: 'cache.listener', type });
        }
      }
    });
  }

  clear(): void {
    this.listeners.clear();
  }
}
