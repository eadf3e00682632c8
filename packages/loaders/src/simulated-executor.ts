import { setTimeout as sleep } from 'node:timers/promises';
import type { AgentExecutor } from '@modelgate/core';

/** Executor that waits a fixed time and echoes the task. */
export class SimulatedAgentExecutor implements AgentExecutor {
  constructor(private readonly delayMs = 2_000) {}

  async execute(_agentId: string, task: string): Promise<string> {
    await sleep(this.delayMs);
    return `Completed: ${task}`;
  }
}
