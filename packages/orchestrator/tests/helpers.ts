import type { AgentExecutor, Clock, Request, ResourceLoader } from '@modelgate/core';

/** Clock driven by the test. */
export class ManualClock implements Clock {
  private t = 0;

  now(): number {
    return this.t;
  }

  advance(ms: number): void {
    this.t += ms;
  }
}

/** Resolve-from-outside promise. */
export function createDeferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
} {
  let resolveOuter: (value: T) => void = () => {};
  const promise = new Promise<T>((resolve) => {
    resolveOuter = resolve;
  });
  return { promise, resolve: resolveOuter };
}

/**
 * Loader that records `load(id)` / `unload(id)` into a shared event log.
 * Operations can be made to fail or to block on a gate.
 */
export class RecordingLoader implements ResourceLoader {
  readonly failLoad = new Set<string>();
  readonly failUnload = new Set<string>();
  gate: Promise<void> | null = null;
  active = 0;
  maxActive = 0;

  constructor(readonly events: string[] = []) {}

  get calls(): string[] {
    return this.events.filter((e) => e.startsWith('load(') || e.startsWith('unload('));
  }

  async load(resourceId: string): Promise<void> {
    await this.run(`load(${resourceId})`, this.failLoad.has(resourceId));
  }

  async unload(resourceId: string): Promise<void> {
    await this.run(`unload(${resourceId})`, this.failUnload.has(resourceId));
  }

  private async run(event: string, fail: boolean): Promise<void> {
    this.events.push(event);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.gate) await this.gate;
      if (fail) throw new Error(`${event} refused`);
    } finally {
      this.active--;
    }
  }
}

/** Executor that records `exec(agent:task)` into the shared event log. */
export class RecordingExecutor implements AgentExecutor {
  readonly failing = new Set<string>();
  onExecute: ((request: Request) => Promise<void> | void) | null = null;

  constructor(readonly events: string[] = []) {}

  async execute(agentId: string, task: string, request: Request): Promise<unknown> {
    this.events.push(`exec(${agentId}:${task})`);
    if (this.onExecute) await this.onExecute(request);
    if (this.failing.has(agentId)) throw new Error('agent crashed');
    return `done: ${task}`;
  }
}

/** Wait (on real timers) until the coordinator reports idle. */
export async function waitForIdle(target: { isIdle: boolean }): Promise<void> {
  for (let i = 0; i < 200 && !target.isIdle; i++) {
    await new Promise((resolve) => setTimeout(resolve, 0));
  }
  if (!target.isIdle) throw new Error('coordinator did not become idle');
}
