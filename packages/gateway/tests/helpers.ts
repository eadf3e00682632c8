import type { AgentExecutor, ResourceLoader } from '@modelgate/core';
import { Coordinator, ResourceRegistry } from '@modelgate/orchestrator';

/**
 * Coordinator over instant fakes. With `gated`, every execution waits until
 * `release()` is called.
 */
export function createTestCoordinator(options: { gated?: boolean } = {}): {
  coordinator: Coordinator;
  release: () => void;
} {
  let release: () => void = () => {};
  const gate = options.gated
    ? new Promise<void>((resolve) => {
        release = resolve;
      })
    : Promise.resolve();

  const loader: ResourceLoader = {
    load: async () => {},
    unload: async () => {},
  };
  const executor: AgentExecutor = {
    execute: async (_agentId, task) => {
      await gate;
      return `done: ${task}`;
    },
  };
  const coordinator = new Coordinator({
    registry: new ResourceRegistry(
      [
        { id: 'M', cost: 4 },
        { id: 'N', cost: 2 },
      ],
      [
        { id: 'A', resource: 'M' },
        { id: 'B', resource: 'M' },
        { id: 'C', resource: 'N' },
      ],
    ),
    loader,
    executor,
    keepAliveMs: 60_000,
  });

  return { coordinator, release: () => release() };
}
