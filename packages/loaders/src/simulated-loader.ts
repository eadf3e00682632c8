import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger, ResourceLoader } from '@modelgate/core';
import { noopLogger } from '@modelgate/core';

export interface SimulatedLoaderOptions {
  loadDelayMs?: number;
  unloadDelayMs?: number;
  logger?: Logger;
}

/** Loader that only waits. For demos and local runs without containers. */
export class SimulatedResourceLoader implements ResourceLoader {
  private readonly loadDelayMs: number;
  private readonly unloadDelayMs: number;
  private readonly logger: Logger;

  constructor(options: SimulatedLoaderOptions = {}) {
    this.loadDelayMs = options.loadDelayMs ?? 3_000;
    this.unloadDelayMs = options.unloadDelayMs ?? 1_000;
    this.logger = options.logger ?? noopLogger;
  }

  async load(resourceId: string): Promise<void> {
    this.logger.debug(`Simulating load of ${resourceId} (${this.loadDelayMs}ms)`);
    await sleep(this.loadDelayMs);
  }

  async unload(resourceId: string): Promise<void> {
    this.logger.debug(`Simulating unload of ${resourceId} (${this.unloadDelayMs}ms)`);
    await sleep(this.unloadDelayMs);
  }
}
