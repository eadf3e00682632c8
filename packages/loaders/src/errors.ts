/** A container runtime command exited non-zero or timed out. */
export class ContainerCommandError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr: string,
    public readonly timedOut = false,
  ) {
    super(
      timedOut
        ? `${command} timed out`
        : `${command} failed (exit ${exitCode}): ${stderr.trim()}`,
    );
    this.name = 'ContainerCommandError';
  }
}

/** The agent's HTTP endpoint answered with a non-2xx status. */
export class AgentHttpError extends Error {
  constructor(
    public readonly agentId: string,
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`Agent "${agentId}" responded ${status}${body ? `: ${body}` : ''}`);
    this.name = 'AgentHttpError';
  }
}
