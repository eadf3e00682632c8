import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import type {
  CoordinatorConfig,
  ExecutorConfig,
  LoaderConfig,
  ModelgateConfig,
  ServerConfig,
} from './config.js';
import type { AgentBinding, Resource } from './scheduling.js';
import { applyEnvOverrides } from './config-env-overlay.js';
import { isRecord } from './utils.js';

/** Sections that must exist at the top level of the config. */
const REQUIRED_SECTIONS = ['coordinator', 'resources', 'agents', 'loader', 'executor'] as const;

/** All valid top-level keys (required + optional). */
const VALID_TOP_LEVEL_KEYS = new Set<string>([...REQUIRED_SECTIONS, 'server']);

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: ModelgateConfig;
}

/**
 * Parse and validate a JSON5 config string.
 * Rejects unknown top-level keys (strict mode). When `env` is given,
 * `MODELGATE_*` overrides are applied before validation.
 */
export function validateConfig(
  json5String: string,
  env?: Record<string, string | undefined>,
): ConfigValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }
  if (env && isRecord(parsed)) {
    applyEnvOverrides(parsed, env);
  }
  return validateConfigObject(parsed);
}

/** Validate an already-parsed config value (e.g. after env overrides). */
export function validateConfigObject(parsed: unknown): ConfigValidationResult {
  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  const errors: ConfigValidationError[] = [];

  for (const key of Object.keys(parsed)) {
    if (!VALID_TOP_LEVEL_KEYS.has(key)) {
      errors.push({ path: key, message: `Unknown top-level key: "${key}"` });
    }
  }

  for (const section of REQUIRED_SECTIONS) {
    if (!(section in parsed)) {
      errors.push({ path: section, message: `Missing required section: "${section}"` });
    }
  }
  if (errors.length > 0) {
    return { valid: false, errors };
  }

  const reader = new Reader(errors);
  const coordinator = readCoordinator(reader, parsed['coordinator']);
  const resources = readResources(reader, parsed['resources']);
  const agents = readAgents(reader, parsed['agents'], resources);
  const loader = readLoader(reader, parsed['loader'], resources);
  const executor = readExecutor(reader, parsed['executor'], agents);
  const server = parsed['server'] === undefined ? undefined : readServer(reader, parsed['server']);

  if (errors.length > 0 || !coordinator || !loader || !executor) {
    return { valid: false, errors };
  }

  const config: ModelgateConfig = { coordinator, resources, agents, loader, executor };
  if (server) config.server = server;
  return { valid: true, errors, config };
}

/**
 * Load and validate a JSON5 config file from disk.
 */
export function loadConfig(
  filePath: string,
  env?: Record<string, string | undefined>,
): ConfigValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
    };
  }
  return validateConfig(content, env);
}

// ── Section readers ─────────────────────────────────────────────────────

function readCoordinator(r: Reader, value: unknown): CoordinatorConfig | undefined {
  const obj = r.object('coordinator', value);
  if (!obj) return undefined;
  const keepAliveMs = r.positive('coordinator.keepAliveMs', obj['keepAliveMs']);
  const evictionIntervalMs = r.positive('coordinator.evictionIntervalMs', obj['evictionIntervalMs']);
  if (keepAliveMs === undefined || evictionIntervalMs === undefined) return undefined;

  if (evictionIntervalMs >= keepAliveMs) {
    r.fail('coordinator.evictionIntervalMs', 'Must be less than keepAliveMs');
  }

  const config: CoordinatorConfig = { keepAliveMs, evictionIntervalMs };
  if (obj['maxQueueSize'] !== undefined) {
    const max = r.nonNegative('coordinator.maxQueueSize', obj['maxQueueSize']);
    if (max !== undefined) config.maxQueueSize = max;
  }
  if (obj['unloadOnShutdown'] !== undefined) {
    const flag = r.boolean('coordinator.unloadOnShutdown', obj['unloadOnShutdown']);
    if (flag !== undefined) config.unloadOnShutdown = flag;
  }
  return config;
}

function readResources(r: Reader, value: unknown): Resource[] {
  if (!Array.isArray(value)) {
    r.fail('resources', 'Must be an array');
    return [];
  }
  const resources: Resource[] = [];
  const seen = new Set<string>();
  value.forEach((entry: unknown, i) => {
    const path = `resources[${i}]`;
    const obj = r.object(path, entry);
    if (!obj) return;
    const id = r.string(`${path}.id`, obj['id']);
    const cost = r.nonNegative(`${path}.cost`, obj['cost']);
    if (id === undefined || cost === undefined) return;
    if (seen.has(id)) {
      r.fail(`${path}.id`, `Duplicate resource id: "${id}"`);
      return;
    }
    seen.add(id);
    const resource: Resource = { id, cost };
    if (obj['container'] !== undefined) {
      const container = r.string(`${path}.container`, obj['container']);
      if (container !== undefined) resource.container = container;
    }
    resources.push(resource);
  });
  return resources;
}

function readAgents(r: Reader, value: unknown, resources: Resource[]): AgentBinding[] {
  if (!Array.isArray(value)) {
    r.fail('agents', 'Must be an array');
    return [];
  }
  const resourceIds = new Set(resources.map((res) => res.id));
  const agents: AgentBinding[] = [];
  const seen = new Set<string>();
  value.forEach((entry: unknown, i) => {
    const path = `agents[${i}]`;
    const obj = r.object(path, entry);
    if (!obj) return;
    const id = r.string(`${path}.id`, obj['id']);
    const resource = r.string(`${path}.resource`, obj['resource']);
    if (id === undefined || resource === undefined) return;
    if (seen.has(id)) {
      r.fail(`${path}.id`, `Duplicate agent id: "${id}"`);
      return;
    }
    if (!resourceIds.has(resource)) {
      r.fail(`${path}.resource`, `Unknown resource: "${resource}"`);
      return;
    }
    seen.add(id);
    const agent: AgentBinding = { id, resource };
    if (obj['endpoint'] !== undefined) {
      const endpoint = r.string(`${path}.endpoint`, obj['endpoint']);
      if (endpoint !== undefined) agent.endpoint = endpoint;
    }
    agents.push(agent);
  });
  return agents;
}

function readLoader(r: Reader, value: unknown, resources: Resource[]): LoaderConfig | undefined {
  const obj = r.object('loader', value);
  if (!obj) return undefined;

  switch (obj['kind']) {
    case 'simulated':
      return {
        kind: 'simulated',
        loadDelayMs: r.optionalNonNegative('loader.loadDelayMs', obj['loadDelayMs']),
        unloadDelayMs: r.optionalNonNegative('loader.unloadDelayMs', obj['unloadDelayMs']),
      };
    case 'container': {
      const runtime = obj['runtime'] ?? 'podman';
      if (runtime !== 'podman' && runtime !== 'docker') {
        r.fail('loader.runtime', 'Must be "podman" or "docker"');
        return undefined;
      }
      for (const res of resources) {
        if (!res.container) {
          r.fail('loader', `Resource "${res.id}" has no container name`);
        }
      }
      return {
        kind: 'container',
        runtime,
        startupGraceMs: r.optionalNonNegative('loader.startupGraceMs', obj['startupGraceMs']),
        timeoutMs: r.optionalPositive('loader.timeoutMs', obj['timeoutMs']),
      };
    }
    default:
      r.fail('loader.kind', 'Must be "simulated" or "container"');
      return undefined;
  }
}

function readExecutor(
  r: Reader,
  value: unknown,
  agents: AgentBinding[],
): ExecutorConfig | undefined {
  const obj = r.object('executor', value);
  if (!obj) return undefined;

  switch (obj['kind']) {
    case 'simulated':
      return {
        kind: 'simulated',
        delayMs: r.optionalNonNegative('executor.delayMs', obj['delayMs']),
      };
    case 'http':
      for (const agent of agents) {
        if (!agent.endpoint) {
          r.fail('executor', `Agent "${agent.id}" has no endpoint`);
        }
      }
      return {
        kind: 'http',
        timeoutMs: r.optionalPositive('executor.timeoutMs', obj['timeoutMs']),
      };
    default:
      r.fail('executor.kind', 'Must be "simulated" or "http"');
      return undefined;
  }
}

function readServer(r: Reader, value: unknown): ServerConfig | undefined {
  const obj = r.object('server', value);
  if (!obj) return undefined;
  const port = r.nonNegative('server.port', obj['port']);
  if (port === undefined) return undefined;
  const server: ServerConfig = { port };
  if (obj['host'] !== undefined) {
    const host = r.string('server.host', obj['host']);
    if (host !== undefined) server.host = host;
  }
  return server;
}

/** Collects errors while narrowing untyped values. */
class Reader {
  constructor(private readonly errors: ConfigValidationError[]) {}

  fail(path: string, message: string): void {
    this.errors.push({ path, message });
  }

  object(path: string, value: unknown): Record<string, unknown> | undefined {
    if (isRecord(value)) return value;
    this.fail(path, 'Must be an object');
    return undefined;
  }

  string(path: string, value: unknown): string | undefined {
    if (typeof value === 'string' && value.length > 0) return value;
    this.fail(path, 'Must be a non-empty string');
    return undefined;
  }

  boolean(path: string, value: unknown): boolean | undefined {
    if (typeof value === 'boolean') return value;
    this.fail(path, 'Must be a boolean');
    return undefined;
  }

  positive(path: string, value: unknown): number | undefined {
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) return value;
    this.fail(path, 'Must be a positive number');
    return undefined;
  }

  nonNegative(path: string, value: unknown): number | undefined {
    if (typeof value === 'number' && Number.isFinite(value) && value >= 0) return value;
    this.fail(path, 'Must be a non-negative number');
    return undefined;
  }

  optionalPositive(path: string, value: unknown): number | undefined {
    return value === undefined ? undefined : this.positive(path, value);
  }

  optionalNonNegative(path: string, value: unknown): number | undefined {
    return value === undefined ? undefined : this.nonNegative(path, value);
  }
}
