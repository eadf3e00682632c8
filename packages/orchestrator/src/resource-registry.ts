import type { AgentBinding, ModelgateConfig, Resource } from '@modelgate/core';
import { AgentNotFoundError } from '@modelgate/core';
import { RegistryError } from './errors.js';

/**
 * Static agent → resource table. Built once at startup and never mutated.
 */
export class ResourceRegistry {
  private readonly resourcesById = new Map<string, Readonly<Resource>>();
  private readonly agentsById = new Map<string, Readonly<AgentBinding>>();

  constructor(resources: Resource[], agents: AgentBinding[]) {
    for (const resource of resources) {
      if (this.resourcesById.has(resource.id)) {
        throw new RegistryError(`Duplicate resource: ${resource.id}`);
      }
      this.resourcesById.set(resource.id, Object.freeze({ ...resource }));
    }
    for (const agent of agents) {
      if (this.agentsById.has(agent.id)) {
        throw new RegistryError(`Duplicate agent: ${agent.id}`);
      }
      if (!this.resourcesById.has(agent.resource)) {
        throw new RegistryError(
          `Agent "${agent.id}" references unknown resource "${agent.resource}"`,
        );
      }
      this.agentsById.set(agent.id, Object.freeze({ ...agent }));
    }
  }

  static fromConfig(config: Pick<ModelgateConfig, 'resources' | 'agents'>): ResourceRegistry {
    return new ResourceRegistry(config.resources, config.agents);
  }

  hasAgent(agentId: string): boolean {
    return this.agentsById.has(agentId);
  }

  /** Resource id the agent needs. Throws {@link AgentNotFoundError} for unknown agents. */
  resourceFor(agentId: string): string {
    const agent = this.agentsById.get(agentId);
    if (!agent) throw new AgentNotFoundError(agentId);
    return agent.resource;
  }

  listAgents(): Readonly<AgentBinding>[] {
    return [...this.agentsById.values()];
  }

  listResources(): Readonly<Resource>[] {
    return [...this.resourcesById.values()];
  }
}
