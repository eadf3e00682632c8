import { randomUUID } from 'node:crypto';

/** Generate a random request/session identifier. */
export function generateId(): string {
  return randomUUID();
}

/** Current time as RFC 3339 string. */
export function now(): string {
  return new Date().toISOString();
}

/** Type guard: checks that a value is a non-null object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Normalise anything thrown into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
