import type { Logger } from '@modelgate/core';
import { noopLogger, toError } from '@modelgate/core';
import type { ResourceManager } from './resource-manager.js';

export interface IdleEvictorOptions {
  manager: ResourceManager;
  keepAliveMs: number;
  /** Tick period. Should be well below keepAliveMs. */
  intervalMs: number;
  /** True when the coordinator is idle (queue empty, nothing executing). */
  canEvict: () => boolean;
  logger?: Logger;
}

/** Background timer that unloads the resource after it sits idle. */
export class IdleEvictor {
  private readonly options: IdleEvictorOptions;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<boolean> | null = null;

  constructor(options: IdleEvictorOptions) {
    this.options = options;
    this.logger = options.logger ?? noopLogger;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
    this.timer.unref();
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Run one eviction check. Overlapping ticks are skipped. */
  tick(): Promise<boolean> {
    if (this.inFlight) return Promise.resolve(false);
    const { manager, keepAliveMs, canEvict } = this.options;

    const current = manager.evictIfIdle(keepAliveMs, canEvict).catch((err: unknown) => {
      this.logger.error(`Idle eviction failed: ${toError(err).message}`);
      return false;
    });
    this.inFlight = current;
    void current.then(() => {
      this.inFlight = null;
    });
    return current;
  }

  /** Stop ticking and wait for a tick already in progress. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }
}
