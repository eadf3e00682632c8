import { setTimeout as sleep } from 'node:timers/promises';
import { Priority } from '@modelgate/core';
import type { RequestOutcome } from '@modelgate/core';
import { createConsoleLogger } from '@modelgate/app';
import { SimulatedAgentExecutor, SimulatedResourceLoader } from '@modelgate/loaders';
import { Coordinator, ResourceRegistry } from '@modelgate/orchestrator';

// --- Configuration via env vars ---
// Scales every simulated delay; 1 = realistic seconds, 0.1 = ten times faster.
const SPEED = Number(process.env['DEMO_SPEED'] ?? '0.1');
const ms = (value: number) => Math.round(value * SPEED);

const logger = createConsoleLogger('info');

const registry = new ResourceRegistry(
  [
    { id: 'qwen-14b', cost: 4 },
    { id: 'qwen-7b', cost: 2 },
    { id: 'whisper', cost: 2 },
  ],
  [
    { id: 'plutus', resource: 'qwen-14b' },
    { id: 'hermes', resource: 'qwen-14b' },
    { id: 'apollo', resource: 'qwen-7b' },
    { id: 'oracle', resource: 'whisper' },
  ],
);

const coordinator = new Coordinator({
  registry,
  loader: new SimulatedResourceLoader({
    loadDelayMs: ms(3_000),
    unloadDelayMs: ms(1_000),
    logger,
  }),
  executor: new SimulatedAgentExecutor(ms(2_000)),
  keepAliveMs: ms(8_000),
  evictionIntervalMs: ms(1_000),
  logger,
});

coordinator.subscribe((outcome: RequestOutcome) => {
  const { request, status, waitMs } = outcome;
  const detail = outcome.error ? outcome.error.message : String(outcome.result);
  console.log(`  -> ${request.agentId} ${status} after ${(waitMs / 1000).toFixed(1)}s queued: ${detail}`);
});

interface Step {
  label: string;
  agent: string;
  task: string;
  priority: Priority;
  requester?: string;
  pauseMs: number;
}

const businessDay: Step[] = [
  {
    label: 'MORNING: invoice generation',
    agent: 'plutus',
    task: 'Generate invoices for all outstanding work orders',
    priority: Priority.CRITICAL,
    requester: 'owner',
    pauseMs: 5_000,
  },
  {
    label: 'MORNING: email drafting',
    agent: 'hermes',
    task: 'Draft follow-up emails to 5 clients',
    priority: Priority.CRITICAL,
    requester: 'owner',
    pauseMs: 5_000,
  },
  {
    label: 'BACKGROUND: analytics',
    agent: 'apollo',
    task: 'Generate weekly performance report',
    priority: Priority.LOW,
    pauseMs: 5_000,
  },
  {
    label: 'MIDDAY: voice query',
    agent: 'oracle',
    task: "What's on my calendar today?",
    priority: Priority.CRITICAL,
    requester: 'owner',
    pauseMs: 10_000,
  },
];

async function main(): Promise<void> {
  console.log('Simulating a business day on a single-model host\n');
  coordinator.start();

  for (const step of businessDay) {
    console.log(`\n${step.label}`);
    const ack = coordinator.submit(step.agent, step.task, step.priority, step.requester);
    if (!ack.accepted) console.log(`  rejected: ${ack.message}`);
    await sleep(ms(step.pauseMs));
  }

  const { stats, loadedResource } = coordinator.status();
  console.log('\nFINAL STATUS');
  console.log(`Requests completed: ${stats.totalCompleted} (failed: ${stats.totalFailed})`);
  console.log(`Average wait time: ${stats.averageWaitSeconds.toFixed(1)}s`);
  console.log(`Resource loads: ${stats.resourceLoads}, unloads: ${stats.resourceUnloads}, evictions: ${stats.evictions}`);
  console.log(`Currently loaded: ${loadedResource ?? 'nothing'}`);

  await coordinator.shutdown();
}

main().catch((err) => {
  console.error('Fatal:', err);
  process.exit(1);
});
