import { isRecord } from './utils.js';

const PREFIX = 'MODELGATE_';
const SEPARATOR = '__';

/** Entry-point variables that share the prefix but are not config paths. */
const RESERVED = new Set(['CONFIG', 'LOG_LEVEL']);

/**
 * Coerce a string value to a number, boolean, or leave as string.
 */
function coerce(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

/**
 * Apply environment variable overrides to a raw (not yet validated) config.
 *
 * Variables must be prefixed with `MODELGATE_`. Nesting is expressed
 * with double-underscore (`__`); segments match existing keys
 * case-insensitively, and numeric segments index into arrays.
 * Values are coerced to numbers/booleans where possible.
 * `MODELGATE_CONFIG` and `MODELGATE_LOG_LEVEL` are skipped.
 *
 * Example: `MODELGATE_COORDINATOR__KEEPALIVEMS=60000`
 *   → `config.coordinator.keepAliveMs = 60000`
 *
 * @param config The config object to mutate in-place.
 * @param env    Optional env map (defaults to `process.env`).
 * @returns The mutated config (same reference).
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: Record<string, string | undefined> = process.env,
): Record<string, unknown> {
  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || rawValue === undefined) continue;

    const name = key.slice(PREFIX.length);
    if (RESERVED.has(name)) continue;

    const path = name.split(SEPARATOR);
    if (path.length === 0 || path.some((segment) => segment === '')) continue;

    setNested(config, path, coerce(rawValue));
  }

  return config;
}

type Container = Record<string, unknown> | unknown[];

function setNested(root: Record<string, unknown>, path: string[], value: unknown): void {
  let current: Container = root;

  for (let i = 0; i < path.length; i++) {
    const segment = path[i];
    if (segment === undefined) return;
    const last = i === path.length - 1;

    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index) || index < 0) return;
      if (last) {
        current[index] = value;
        return;
      }
      const next: unknown = current[index];
      if (isRecord(next) || Array.isArray(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[index] = created;
        current = created;
      }
      continue;
    }

    const key = resolveKey(current, segment);
    if (last) {
      current[key] = value;
      return;
    }
    const next: unknown = current[key];
    if (isRecord(next) || Array.isArray(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
}

/** Find the existing key matching `segment` ignoring case, else lowercase it. */
function resolveKey(obj: Record<string, unknown>, segment: string): string {
  const lower = segment.toLowerCase();
  return Object.keys(obj).find((k) => k.toLowerCase() === lower) ?? lower;
}
