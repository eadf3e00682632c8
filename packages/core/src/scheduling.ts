/** Request priority. Lower rank is dequeued first. */
export enum Priority {
  CRITICAL = 'CRITICAL',
  HIGH = 'HIGH',
  NORMAL = 'NORMAL',
  LOW = 'LOW',
}

/** Numeric rank of each priority: CRITICAL=0 … LOW=3. */
export const PRIORITY_RANK: Readonly<Record<Priority, number>> = {
  [Priority.CRITICAL]: 0,
  [Priority.HIGH]: 1,
  [Priority.NORMAL]: 2,
  [Priority.LOW]: 3,
};

/** Parse a priority name case-insensitively. Returns undefined for unknown names. */
export function parsePriority(value: string): Priority | undefined {
  return PRIORITY_BY_NAME.get(value.trim().toUpperCase());
}

const PRIORITY_BY_NAME = new Map<string, Priority>(Object.values(Priority).map((p) => [p, p]));

/** One unit of work. Frozen once submitted. */
export interface Request {
  readonly id: string;
  readonly agentId: string;
  readonly task: string;
  readonly priority: Priority;
  /** Monotonic milliseconds at submission. */
  readonly submittedAt: number;
  /** Strictly increasing submission counter; tie-breaker within a priority. */
  readonly sequence: number;
  readonly requesterId?: string;
}

/** A loadable unit (typically a model) and what it costs to hold. */
export interface Resource {
  id: string;
  cost: number;
  /** Pod/container name used by the container loader. */
  container?: string;
}

/** Agent → resource binding. */
export interface AgentBinding {
  id: string;
  resource: string;
  /** HTTP endpoint used by the HTTP executor. */
  endpoint?: string;
}

export type RejectReason = 'AgentNotFound' | 'QueueFull' | 'ShuttingDown';

/** Acknowledgement returned by submit. Never blocks on execution. */
export type SubmitResult =
  | { accepted: true; requestId: string; position: number }
  | { accepted: false; reason: RejectReason; message: string };

export interface CoordinatorStats {
  totalSubmitted: number;
  totalCompleted: number;
  totalFailed: number;
  averageWaitSeconds: number;
  totalRejected: number;
  totalCancelled: number;
  resourceLoads: number;
  resourceUnloads: number;
  evictions: number;
  drainLoopsStarted: number;
}

export interface CoordinatorStatus {
  queueSize: number;
  isProcessing: boolean;
  loadedResource: string | null;
  stats: CoordinatorStats;
}

export type OutcomeStatus = 'completed' | 'failed' | 'cancelled';

/** Published once per request on the result channel. */
export interface RequestOutcome {
  request: Request;
  status: OutcomeStatus;
  /** Time spent queued before the drain loop picked the request up. */
  waitMs: number;
  result?: unknown;
  error?: { name: string; message: string };
}

/** Boundary to whatever actually loads and unloads a resource. */
export interface ResourceLoader {
  load(resourceId: string): Promise<void>;
  unload(resourceId: string): Promise<void>;
}

/** Boundary to the agent behaviour. Opaque to the scheduler. */
export interface AgentExecutor {
  execute(agentId: string, task: string, request: Request): Promise<unknown>;
}

/** Monotonic millisecond clock. */
export interface Clock {
  now(): number;
}

/** Disposable handle returned from registrations. */
export interface Disposable {
  dispose(): void;
}
