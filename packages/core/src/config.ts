import type { AgentBinding, Resource } from './scheduling.js';

/** Top-level configuration schema. */
export interface ModelgateConfig {
  coordinator: CoordinatorConfig;
  resources: Resource[];
  agents: AgentBinding[];
  loader: LoaderConfig;
  executor: ExecutorConfig;
  server?: ServerConfig;
}

export interface CoordinatorConfig {
  /** Minimum idle time before a loaded resource is evicted. */
  keepAliveMs: number;
  /** How often the evictor checks for idleness. Must be below keepAliveMs. */
  evictionIntervalMs: number;
  /** 0 means unbounded. */
  maxQueueSize?: number;
  /** Unload the loaded resource during shutdown. Default: true. */
  unloadOnShutdown?: boolean;
}

export type LoaderConfig =
  | {
      kind: 'simulated';
      loadDelayMs?: number;
      unloadDelayMs?: number;
    }
  | {
      kind: 'container';
      runtime: 'podman' | 'docker';
      /** Wait after a pod starts before it is considered ready. */
      startupGraceMs?: number;
      timeoutMs?: number;
    };

export type ExecutorConfig =
  | { kind: 'simulated'; delayMs?: number }
  | { kind: 'http'; timeoutMs?: number };

export interface ServerConfig {
  port: number;
  host?: string;
}
