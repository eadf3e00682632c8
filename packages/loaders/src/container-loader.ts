import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger, Resource, ResourceLoader } from '@modelgate/core';
import { noopLogger } from '@modelgate/core';
import { ContainerCommandError } from './errors.js';
import { execFile } from './exec-util.js';

export type ContainerRuntime = 'podman' | 'docker';

export interface ContainerLoaderOptions {
  /** Resources with their pod/container names. */
  resources: Resource[];
  runtime?: ContainerRuntime;
  /** Wait after `pod start` for services inside the pod to come up. Default: 3000. */
  startupGraceMs?: number;
  /** Per-command timeout. Default: 30000. */
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_STARTUP_GRACE_MS = 3_000;
const DEFAULT_TIMEOUT_MS = 30_000;
const STATUS_TIMEOUT_MS = 5_000;

/**
 * Loads a resource by starting its pod and unloads it by stopping the pod.
 */
export class ContainerResourceLoader implements ResourceLoader {
  private readonly containers = new Map<string, string>();
  private readonly runtime: ContainerRuntime;
  private readonly startupGraceMs: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ContainerLoaderOptions) {
    for (const resource of options.resources) {
      if (resource.container) this.containers.set(resource.id, resource.container);
    }
    this.runtime = options.runtime ?? 'podman';
    this.startupGraceMs = options.startupGraceMs ?? DEFAULT_STARTUP_GRACE_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? noopLogger;
  }

  async load(resourceId: string): Promise<void> {
    const pod = this.containerFor(resourceId);
    this.logger.info(`Starting pod ${pod}`);
    await this.run(['pod', 'start', pod], this.timeoutMs);
    if (this.startupGraceMs > 0) {
      await sleep(this.startupGraceMs);
    }
  }

  async unload(resourceId: string): Promise<void> {
    const pod = this.containerFor(resourceId);
    this.logger.info(`Stopping pod ${pod}`);
    await this.run(['pod', 'stop', pod], this.timeoutMs);
  }

  /**
   * Resource whose pod is already running, if any. Used at startup so a pod
   * left running by a previous process is adopted instead of restarted.
   */
  async syncLoaded(): Promise<string | null> {
    for (const [resourceId, pod] of this.containers) {
      const result = await execFile(
        this.runtime,
        ['pod', 'ps', '--filter', `name=${pod}`, '--format', '{{.Status}}'],
        { timeout: STATUS_TIMEOUT_MS },
      );
      if (result.exitCode !== 0) {
        this.logger.warn(`Could not query pod ${pod}: ${result.stderr.trim()}`);
        continue;
      }
      if (result.stdout.includes('Running')) {
        this.logger.info(`Pod ${pod} already running`);
        return resourceId;
      }
    }
    return null;
  }

  private containerFor(resourceId: string): string {
    const pod = this.containers.get(resourceId);
    if (!pod) throw new Error(`Resource "${resourceId}" has no container name`);
    return pod;
  }

  private async run(args: string[], timeout: number): Promise<void> {
    const result = await execFile(this.runtime, args, { timeout });
    if (result.exitCode !== 0) {
      throw new ContainerCommandError(
        `${this.runtime} ${args.join(' ')}`,
        result.exitCode,
        result.stderr,
        result.timedOut,
      );
    }
  }
}
