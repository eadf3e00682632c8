import type {
  AgentExecutor,
  Clock,
  CoordinatorStats,
  CoordinatorStatus,
  Disposable,
  Logger,
  Request,
  RequestOutcome,
  ResourceLoader,
  SubmitResult,
} from '@modelgate/core';
import {
  AgentNotFoundError,
  ConcurrencyViolationError,
  ExecutionError,
  Priority,
  RequestCancelledError,
  generateId,
  noopLogger,
  toError,
} from '@modelgate/core';
import { AsyncEventQueue } from './async-event-queue.js';
import { IdleEvictor } from './idle-evictor.js';
import { RequestQueue } from './request-queue.js';
import { ResourceManager } from './resource-manager.js';
import type { ResourceRegistry } from './resource-registry.js';

/** Options for the Coordinator. */
export interface CoordinatorOptions {
  registry: ResourceRegistry;
  loader: ResourceLoader;
  executor: AgentExecutor;
  /** Minimum idle time before the loaded resource is evicted. */
  keepAliveMs: number;
  /** Eviction check period. Default: keepAliveMs / 5. */
  evictionIntervalMs?: number;
  /** Reject submissions beyond this many pending requests. 0 = unbounded. */
  maxQueueSize?: number;
  /** Unload the loaded resource in shutdown(). Default: true. */
  unloadOnShutdown?: boolean;
  clock?: Clock;
  logger?: Logger;
}

export type OutcomeListener = (outcome: RequestOutcome) => void;

const monotonicClock: Clock = { now: () => performance.now() };

/** Counters owned by the drain loop; resource counters come from the manager. */
type RequestCounters = Omit<CoordinatorStats, 'resourceLoads' | 'resourceUnloads' | 'evictions'>;

/**
 * Runs agent requests one at a time against a single loadable resource.
 *
 * - submit() validates, stamps and queues a request, then returns at once.
 * - At most one drain loop is active; it pops by priority, ensures the
 *   agent's resource is loaded, executes, and records the outcome.
 * - The idle evictor unloads the resource only while the drain loop is idle.
 *
 * State machine: Idle → Processing on the first push while idle,
 * Processing → Idle when the queue is drained.
 */
export class Coordinator {
  private readonly registry: ResourceRegistry;
  private readonly executor: AgentExecutor;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly maxQueueSize: number;
  private readonly unloadOnShutdown: boolean;

  private readonly queue = new RequestQueue();
  private readonly resources: ResourceManager;
  private readonly evictor: IdleEvictor;
  private readonly listeners = new Set<OutcomeListener>();
  private readonly streams = new Set<AsyncEventQueue<RequestOutcome>>();

  private readonly counters: RequestCounters = {
    totalSubmitted: 0,
    totalCompleted: 0,
    totalFailed: 0,
    averageWaitSeconds: 0,
    totalRejected: 0,
    totalCancelled: 0,
    drainLoopsStarted: 0,
  };

  private processing = false;
  private sequence = 0;
  private drainLoop: Promise<void> | null = null;
  private shuttingDown = false;

  constructor(options: CoordinatorOptions) {
    this.registry = options.registry;
    this.executor = options.executor;
    this.clock = options.clock ?? monotonicClock;
    this.logger = options.logger ?? noopLogger;
    this.maxQueueSize = options.maxQueueSize ?? 0;
    this.unloadOnShutdown = options.unloadOnShutdown ?? true;

    this.resources = new ResourceManager({
      loader: options.loader,
      clock: this.clock,
      logger: this.logger,
    });
    this.evictor = new IdleEvictor({
      manager: this.resources,
      keepAliveMs: options.keepAliveMs,
      intervalMs: options.evictionIntervalMs ?? options.keepAliveMs / 5,
      canEvict: () => this.isIdle,
      logger: this.logger,
    });
  }

  /** Begin idle eviction. Submissions are accepted with or without it. */
  start(): void {
    this.evictor.start();
  }

  /**
   * Queue a request. Never waits for execution.
   *
   * Unknown agents are rejected synchronously and never queued.
   */
  submit(
    agentId: string,
    task: string,
    priority: Priority = Priority.NORMAL,
    requesterId?: string,
  ): SubmitResult {
    if (this.shuttingDown) {
      this.counters.totalRejected++;
      return { accepted: false, reason: 'ShuttingDown', message: 'Coordinator is shutting down' };
    }

    if (!this.registry.hasAgent(agentId)) {
      this.counters.totalRejected++;
      const err = new AgentNotFoundError(agentId);
      this.logger.warn(`Rejected submission: ${err.message}`);
      return { accepted: false, reason: 'AgentNotFound', message: err.message };
    }

    if (this.maxQueueSize > 0 && this.queue.size() >= this.maxQueueSize) {
      this.counters.totalRejected++;
      const message = `Queue full (${this.maxQueueSize} pending)`;
      this.logger.warn(`Rejected submission for "${agentId}": ${message}`);
      return { accepted: false, reason: 'QueueFull', message };
    }

    this.sequence++;
    const request: Request = Object.freeze({
      id: generateId(),
      agentId,
      task,
      priority,
      submittedAt: this.clock.now(),
      sequence: this.sequence,
      ...(requesterId !== undefined ? { requesterId } : {}),
    });

    this.queue.push(request);
    this.counters.totalSubmitted++;
    const position = this.queue.positionOf(request.id) ?? this.queue.size();
    this.logger.info(
      `Request queued: ${agentId} (${priority}), position ${position}, queue size ${this.queue.size()}`,
    );

    if (!this.processing) {
      this.startDrainLoop();
    }

    return { accepted: true, requestId: request.id, position };
  }

  /** Remove a request that has not started yet. */
  cancel(requestId: string): boolean {
    const request = this.queue.remove(requestId);
    if (!request) return false;

    this.counters.totalCancelled++;
    const err = new RequestCancelledError(requestId);
    this.logger.info(`Request cancelled: ${request.agentId} (${requestId})`);
    this.publish({
      request,
      status: 'cancelled',
      waitMs: this.waitFor(request),
      error: { name: err.name, message: err.message },
    });
    return true;
  }

  /** Point-in-time snapshot. Never mutates state. */
  status(): CoordinatorStatus {
    const resource = this.resources.snapshot();
    const { loads, unloads, evictions } = this.resources.getCounters();
    return {
      queueSize: this.queue.size(),
      isProcessing: this.processing,
      loadedResource: resource.loadedResourceId,
      stats: {
        ...this.counters,
        resourceLoads: loads,
        resourceUnloads: unloads,
        evictions,
      },
    };
  }

  /** Pending requests in the order they will run. */
  pending(): Request[] {
    return this.queue.snapshot();
  }

  /** Queue empty and no request executing. */
  get isIdle(): boolean {
    return !this.processing && this.queue.size() === 0;
  }

  /** Record a resource already loaded outside this process. */
  adoptLoadedResource(resourceId: string): Promise<boolean> {
    return this.resources.adopt(resourceId);
  }

  /** Run one idle-eviction check immediately. */
  evictIdleNow(): Promise<boolean> {
    return this.evictor.tick();
  }

  /** Register a callback for every outcome. */
  subscribe(listener: OutcomeListener): Disposable {
    this.listeners.add(listener);
    return {
      dispose: () => {
        this.listeners.delete(listener);
      },
    };
  }

  /** Async iterable of outcomes published from now on. Ends at shutdown. */
  outcomes(): AsyncIterable<RequestOutcome> {
    const stream = new AsyncEventQueue<RequestOutcome>();
    this.streams.add(stream);
    return stream;
  }

  /**
   * Stop accepting work, stop eviction, wait for the drain loop to finish the
   * queue, then unload the resource (unless disabled).
   */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    await this.evictor.stop();
    if (this.drainLoop) {
      await this.drainLoop;
    }
    if (this.unloadOnShutdown) {
      try {
        await this.resources.release();
      } catch (err) {
        this.logger.error(`Unload on shutdown failed: ${toError(err).message}`);
      }
    }
    for (const stream of this.streams) {
      stream.complete();
    }
    this.streams.clear();
    this.listeners.clear();
  }

  // ── Drain loop ───────────────────────────────────────────────────────

  private startDrainLoop(): void {
    if (this.processing) {
      throw new ConcurrencyViolationError('drain loop already active');
    }
    this.processing = true;
    this.counters.drainLoopsStarted++;
    this.logger.debug('Drain loop started');

    this.drainLoop = this.drain().catch((err: unknown) => {
      this.processing = false;
      this.logger.error(`Drain loop aborted: ${toError(err).message}`);
    });
  }

  private async drain(): Promise<void> {
    // Yield once so submissions made in the same tick are ordered together.
    await Promise.resolve();

    for (;;) {
      const request = this.queue.popHighest();
      if (!request) {
        this.processing = false;
        this.logger.info('Queue empty, coordinator idle');
        return;
      }
      await this.process(request);
    }
  }

  private async process(request: Request): Promise<void> {
    const waitMs = this.waitFor(request);
    this.logger.info(
      `Processing ${request.agentId} (${request.priority}), waited ${(waitMs / 1000).toFixed(1)}s`,
    );

    let resourceId: string;
    try {
      resourceId = this.registry.resourceFor(request.agentId);
      await this.resources.ensure(resourceId);
    } catch (err) {
      if (err instanceof ConcurrencyViolationError) throw err;
      this.recordFailure(request, waitMs, toError(err));
      return;
    }

    let result: unknown;
    let failure: ExecutionError | null = null;
    try {
      result = await this.executor.execute(request.agentId, request.task, request);
    } catch (err) {
      failure = new ExecutionError(request.agentId, err);
    }
    // Idle time starts when the request settles, not when it started.
    await this.resources.touch(resourceId);

    if (failure) {
      this.recordFailure(request, waitMs, failure);
      return;
    }

    this.counters.totalCompleted++;
    const waitSeconds = waitMs / 1000;
    this.counters.averageWaitSeconds +=
      (waitSeconds - this.counters.averageWaitSeconds) / this.counters.totalCompleted;
    this.logger.info(`Task completed: ${request.agentId} (${request.id})`);
    this.publish({ request, status: 'completed', waitMs, result });
  }

  private recordFailure(request: Request, waitMs: number, error: Error): void {
    this.counters.totalFailed++;
    this.logger.error(`Request ${request.id} for ${request.agentId} failed: ${error.message}`);
    this.publish({
      request,
      status: 'failed',
      waitMs,
      error: { name: error.name, message: error.message },
    });
  }

  private publish(outcome: RequestOutcome): void {
    for (const listener of this.listeners) {
      try {
        listener(outcome);
      } catch (err) {
        this.logger.warn(`Outcome listener threw: ${toError(err).message}`);
      }
    }
    for (const stream of this.streams) {
      if (stream.closed) {
        this.streams.delete(stream);
      } else {
        stream.push(outcome);
      }
    }
  }

  private waitFor(request: Request): number {
    return Math.max(0, this.clock.now() - request.submittedAt);
  }
}
