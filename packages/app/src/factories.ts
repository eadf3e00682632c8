import type {
  AgentBinding,
  AgentExecutor,
  ExecutorConfig,
  LoaderConfig,
  Logger,
  Resource,
  ResourceLoader,
} from '@modelgate/core';
import {
  ContainerResourceLoader,
  HttpAgentExecutor,
  SimulatedAgentExecutor,
  SimulatedResourceLoader,
} from '@modelgate/loaders';

export function createLoader(
  config: LoaderConfig,
  resources: Resource[],
  logger: Logger,
): ResourceLoader {
  switch (config.kind) {
    case 'simulated':
      return new SimulatedResourceLoader({
        loadDelayMs: config.loadDelayMs,
        unloadDelayMs: config.unloadDelayMs,
        logger,
      });
    case 'container':
      return new ContainerResourceLoader({
        resources,
        runtime: config.runtime,
        startupGraceMs: config.startupGraceMs,
        timeoutMs: config.timeoutMs,
        logger,
      });
  }
}

export function createExecutor(
  config: ExecutorConfig,
  agents: AgentBinding[],
  logger: Logger,
): AgentExecutor {
  switch (config.kind) {
    case 'simulated':
      return new SimulatedAgentExecutor(config.delayMs);
    case 'http':
      return new HttpAgentExecutor({ agents, timeoutMs: config.timeoutMs, logger });
  }
}
