/**
 * Query Coalescer
 *
 * Concurrent misses for the same key share one in-flight build instead of
 * each going to the store. A caller only joins a build whose fill fence is
 * still intact for the key; once an invalidation has touched the key, the
 * next caller starts a fresh build so it observes the write.
 */

import { createServiceLogger } from '../logger.service.js';
import type { CacheService } from './cache.service.js';
import type { FillFence } from './cache.types.js';

const logger = createServiceLogger('query-coalescer');

interface InFlightBuild<T> {
  promise: Promise<T>;
  fence: FillFence;
}

export class QueryCoalescer<T> {
  private readonly inFlight = new Map<string, InFlightBuild<T>>();

  constructor(private readonly cache: CacheService) {}

  /**
   * Run `build` for `key`, or join an identical build already running.
   * The build receives the fence to pass to its cache writes.
   */
  run(key: string, build: (fence: FillFence) => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing && !this.cache.isFenceBroken(existing.fence, key)) {
      logger.debug({ key }, 'Request coalesced - reusing in-flight build');
      return existing.promise;
    }

    const fence = this.cache.openFence();
    const entry: InFlightBuild<T> = {
      fence,
      promise: build(fence).finally(() => {
        if (this.inFlight.get(key) === entry) {
          this.inFlight.delete(key);
        }
      }),
    };

    this.inFlight.set(key, entry);
    return entry.promise;
  }

  get size(): number {
    return this.inFlight.size;
  }
}
