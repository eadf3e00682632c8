import type { Clock, Logger, ResourceLoader } from '@modelgate/core';
import {
  ConcurrencyViolationError,
  ResourceLoadError,
  ResourceUnloadError,
  noopLogger,
} from '@modelgate/core';
import { AsyncLock } from './async-lock.js';

/** Point-in-time copy of the single resource slot. */
export interface ResourceManagerState {
  loadedResourceId: string | null;
  /** Monotonic ms of the last ensure, adopt or touch. */
  lastUsedAt: number;
  /** True while a load or unload is in flight. */
  busy: boolean;
}

export interface ResourceCounters {
  loads: number;
  unloads: number;
  evictions: number;
}

export interface ResourceManagerOptions {
  loader: ResourceLoader;
  clock: Clock;
  logger?: Logger;
}

/**
 * Owns the one loaded resource.
 *
 * Every state change (ensure, eviction, adopt, release) runs inside the same
 * {@link AsyncLock}, so at most one load/unload is ever in flight and eviction
 * can never interleave with an ensure.
 */
export class ResourceManager {
  private readonly loader: ResourceLoader;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly lock = new AsyncLock();

  private loadedResourceId: string | null = null;
  private lastUsedAt = 0;
  private busy = false;
  private readonly counters: ResourceCounters = { loads: 0, unloads: 0, evictions: 0 };

  constructor(options: ResourceManagerOptions) {
    this.loader = options.loader;
    this.clock = options.clock;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Make `resourceId` the loaded resource.
   *
   * - Already loaded: only refreshes lastUsedAt.
   * - Something else loaded: unload it, then load the requested one.
   * - Nothing loaded: load directly.
   *
   * Rejects with {@link ResourceUnloadError} or {@link ResourceLoadError};
   * after a rejection nothing is considered loaded.
   */
  ensure(resourceId: string): Promise<void> {
    return this.lock.run(async () => {
      if (this.loadedResourceId === resourceId) {
        this.lastUsedAt = this.clock.now();
        this.logger.debug(`Resource "${resourceId}" already loaded, reusing`);
        return;
      }

      if (this.loadedResourceId !== null) {
        await this.unloadLocked(this.loadedResourceId);
      }
      await this.loadLocked(resourceId);
    });
  }

  /**
   * Mark `resourceId` as just used, so its idle time counts from now.
   * No-op when another resource (or none) is loaded.
   */
  touch(resourceId: string): Promise<void> {
    return this.lock.run(async () => {
      if (this.loadedResourceId === resourceId) {
        this.lastUsedAt = this.clock.now();
      }
    });
  }

  /**
   * Unload the resource if it has been idle for at least `keepAliveMs` and
   * `canEvict()` confirms nobody is about to use it. Resolves true when a
   * resource was evicted.
   */
  evictIfIdle(keepAliveMs: number, canEvict: () => boolean): Promise<boolean> {
    return this.lock.run(async () => {
      const current = this.loadedResourceId;
      if (current === null || this.busy || !canEvict()) return false;

      const idleMs = this.clock.now() - this.lastUsedAt;
      if (idleMs < keepAliveMs) return false;

      this.logger.info(`Resource "${current}" idle for ${Math.round(idleMs)}ms, evicting`);
      try {
        await this.unloadLocked(current);
      } catch (err) {
        if (!(err instanceof ResourceUnloadError)) throw err;
        this.logger.error(err.message);
        return false;
      }
      this.counters.evictions++;
      return true;
    });
  }

  /**
   * Record a resource that is already loaded outside this process (e.g. a pod
   * found running at startup). Ignored if something is already loaded.
   */
  adopt(resourceId: string): Promise<boolean> {
    return this.lock.run(async () => {
      if (this.loadedResourceId !== null) return false;
      this.loadedResourceId = resourceId;
      this.lastUsedAt = this.clock.now();
      this.logger.info(`Adopted already-loaded resource "${resourceId}"`);
      return true;
    });
  }

  /** Unload whatever is loaded. Used on shutdown. */
  release(): Promise<void> {
    return this.lock.run(async () => {
      if (this.loadedResourceId !== null) {
        await this.unloadLocked(this.loadedResourceId);
      }
    });
  }

  snapshot(): ResourceManagerState {
    return {
      loadedResourceId: this.loadedResourceId,
      lastUsedAt: this.lastUsedAt,
      busy: this.busy,
    };
  }

  getCounters(): ResourceCounters {
    return { ...this.counters };
  }

  // ── Private helpers (caller holds the lock) ─────────────────────────

  private async loadLocked(resourceId: string): Promise<void> {
    this.beginTransition(`load of "${resourceId}"`);
    const startedAt = this.clock.now();
    try {
      await this.loader.load(resourceId);
    } catch (err) {
      this.loadedResourceId = null;
      throw new ResourceLoadError(resourceId, err);
    } finally {
      this.busy = false;
    }
    this.loadedResourceId = resourceId;
    this.lastUsedAt = this.clock.now();
    this.counters.loads++;
    this.logger.info(`Loaded resource "${resourceId}" in ${Math.round(this.lastUsedAt - startedAt)}ms`);
  }

  private async unloadLocked(resourceId: string): Promise<void> {
    this.beginTransition(`unload of "${resourceId}"`);
    try {
      await this.loader.unload(resourceId);
    } catch (err) {
      throw new ResourceUnloadError(resourceId, err);
    } finally {
      // Never claim a resource is loaded once an unload was attempted.
      this.loadedResourceId = null;
      this.busy = false;
    }
    this.counters.unloads++;
    this.logger.info(`Unloaded resource "${resourceId}"`);
  }

  private beginTransition(what: string): void {
    if (this.busy) {
      throw new ConcurrencyViolationError(`${what} started while another load/unload is in flight`);
    }
    this.busy = true;
  }
}
