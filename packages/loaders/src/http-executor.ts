import type { AgentBinding, AgentExecutor, Logger, Request } from '@modelgate/core';
import { AgentNotFoundError, noopLogger } from '@modelgate/core';
import { AgentHttpError } from './errors.js';

export interface HttpExecutorOptions {
  agents: AgentBinding[];
  /** Per-request timeout. Default: 120000. */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Runs a task by POSTing it to the agent's endpoint:
 * `{ agentId, task, requestId }` → JSON (or text) result.
 */
export class HttpAgentExecutor implements AgentExecutor {
  private readonly endpoints = new Map<string, string>();
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: HttpExecutorOptions) {
    for (const agent of options.agents) {
      if (agent.endpoint) this.endpoints.set(agent.id, agent.endpoint);
    }
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.logger = options.logger ?? noopLogger;
  }

  async execute(agentId: string, task: string, request: Request): Promise<unknown> {
    const endpoint = this.endpoints.get(agentId);
    if (!endpoint) throw new AgentNotFoundError(agentId);

    this.logger.debug(`POST ${endpoint} for ${agentId} (${request.id})`);
    const res = await fetch(endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ agentId, task, requestId: request.id }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const body = await res.text();
    if (!res.ok) {
      throw new AgentHttpError(agentId, res.status, body);
    }
    const contentType = res.headers.get('content-type') ?? '';
    return contentType.includes('application/json') && body ? JSON.parse(body) : body;
  }
}
