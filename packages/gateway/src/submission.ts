import { isRecord, parsePriority } from '@modelgate/core';
import type { Submission } from './types.js';

export type ParseResult = { ok: true; submission: Submission } | { ok: false; error: string };

/** Validate an untrusted `{ agent, task, priority?, requester? }` payload. */
export function parseSubmission(value: unknown): ParseResult {
  if (!isRecord(value)) return { ok: false, error: 'Body must be a JSON object' };

  const { agent, task, priority, requester } = value;
  if (typeof agent !== 'string' || agent.length === 0) {
    return { ok: false, error: '"agent" must be a non-empty string' };
  }
  if (typeof task !== 'string') {
    return { ok: false, error: '"task" must be a string' };
  }

  const submission: Submission = { agent, task };
  if (priority !== undefined) {
    const parsed = typeof priority === 'string' ? parsePriority(priority) : undefined;
    if (!parsed) {
      return { ok: false, error: '"priority" must be one of CRITICAL, HIGH, NORMAL, LOW' };
    }
    submission.priority = parsed;
  }
  if (requester !== undefined) {
    if (typeof requester !== 'string' || requester.length === 0) {
      return { ok: false, error: '"requester" must be a non-empty string' };
    }
    submission.requester = requester;
  }
  return { ok: true, submission };
}
