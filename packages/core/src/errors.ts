/** Submission referenced an agent that is not in the registry. */
export class AgentNotFoundError extends Error {
  constructor(public readonly agentId: string) {
    super(`Agent not registered: ${agentId}`);
    this.name = 'AgentNotFoundError';
  }
}

/** The loader failed to load a resource. */
export class ResourceLoadError extends Error {
  constructor(
    public readonly resourceId: string,
    cause?: unknown,
  ) {
    super(`Failed to load resource "${resourceId}"${describeCause(cause)}`);
    this.name = 'ResourceLoadError';
    this.cause = cause;
  }
}

/** The loader failed to unload a resource. */
export class ResourceUnloadError extends Error {
  constructor(
    public readonly resourceId: string,
    cause?: unknown,
  ) {
    super(`Failed to unload resource "${resourceId}"${describeCause(cause)}`);
    this.name = 'ResourceUnloadError';
    this.cause = cause;
  }
}

/** The executor failed after the resource was ensured. */
export class ExecutionError extends Error {
  constructor(
    public readonly agentId: string,
    cause?: unknown,
  ) {
    super(`Execution failed for agent "${agentId}"${describeCause(cause)}`);
    this.name = 'ExecutionError';
    this.cause = cause;
  }
}

/** A queued request was cancelled before it ran. */
export class RequestCancelledError extends Error {
  constructor(public readonly requestId: string) {
    super(`Request cancelled: ${requestId}`);
    this.name = 'RequestCancelledError';
  }
}

/**
 * Programming error: a second drain loop or a re-entrant load/unload.
 * Never recorded as a request failure.
 */
export class ConcurrencyViolationError extends Error {
  constructor(message: string) {
    super(`Concurrency violation: ${message}`);
    this.name = 'ConcurrencyViolationError';
  }
}

/** Thrown by bootstrap when the config file fails validation. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return '';
  return `: ${cause instanceof Error ? cause.message : String(cause)}`;
}
