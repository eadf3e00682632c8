import { describe, it, expect } from 'vitest';
import type { Request } from '@modelgate/core';
import { Priority } from '@modelgate/core';
import { RequestQueue, compareRequests } from '../src/request-queue.js';

let nextSequence = 0;

function req(id: string, priority: Priority): Request {
  nextSequence++;
  return { id, agentId: 'agent', task: id, priority, submittedAt: 0, sequence: nextSequence };
}

function drainIds(queue: RequestQueue): string[] {
  const ids: string[] = [];
  for (let r = queue.popHighest(); r; r = queue.popHighest()) {
    ids.push(r.id);
  }
  return ids;
}

describe('compareRequests', () => {
  it('orders by priority rank before sequence', () => {
    const low = req('low', Priority.LOW);
    const critical = req('critical', Priority.CRITICAL);
    expect(compareRequests(critical, low)).toBeLessThan(0);
    expect(compareRequests(low, critical)).toBeGreaterThan(0);
  });

  it('breaks ties by earlier sequence', () => {
    const first = req('first', Priority.HIGH);
    const second = req('second', Priority.HIGH);
    expect(compareRequests(first, second)).toBeLessThan(0);
  });
});

describe('RequestQueue', () => {
  it('is empty initially', () => {
    const queue = new RequestQueue();
    expect(queue.size()).toBe(0);
    expect(queue.popHighest()).toBeUndefined();
    expect(queue.peek()).toBeUndefined();
  });

  it('pops the highest priority first', () => {
    const queue = new RequestQueue();
    queue.push(req('low', Priority.LOW));
    queue.push(req('normal', Priority.NORMAL));
    queue.push(req('critical', Priority.CRITICAL));
    queue.push(req('high', Priority.HIGH));

    expect(drainIds(queue)).toEqual(['critical', 'high', 'normal', 'low']);
  });

  it('keeps submission order within the same priority', () => {
    const queue = new RequestQueue();
    for (const id of ['r1', 'r2', 'r3', 'r4', 'r5']) {
      queue.push(req(id, Priority.NORMAL));
    }
    expect(drainIds(queue)).toEqual(['r1', 'r2', 'r3', 'r4', 'r5']);
  });

  it('orders a mixed interleaving by rank then sequence', () => {
    const queue = new RequestQueue();
    const pushed = [
      req('n1', Priority.NORMAL),
      req('l1', Priority.LOW),
      req('c1', Priority.CRITICAL),
      req('n2', Priority.NORMAL),
      req('h1', Priority.HIGH),
      req('c2', Priority.CRITICAL),
      req('l2', Priority.LOW),
      req('h2', Priority.HIGH),
      req('n3', Priority.NORMAL),
    ];
    for (const r of pushed) queue.push(r);

    expect(drainIds(queue)).toEqual(['c1', 'c2', 'h1', 'h2', 'n1', 'n2', 'n3', 'l1', 'l2']);
  });

  it('never returns the same request twice', () => {
    const queue = new RequestQueue();
    for (let i = 0; i < 50; i++) {
      queue.push(req(`r${i}`, [Priority.LOW, Priority.HIGH, Priority.NORMAL][i % 3] ?? Priority.LOW));
    }
    const ids = drainIds(queue);
    expect(ids).toHaveLength(50);
    expect(new Set(ids).size).toBe(50);
  });

  it('removes a pending request by id', () => {
    const queue = new RequestQueue();
    queue.push(req('a', Priority.NORMAL));
    queue.push(req('b', Priority.CRITICAL));
    queue.push(req('c', Priority.LOW));

    expect(queue.remove('b')?.id).toBe('b');
    expect(queue.remove('missing')).toBeUndefined();
    expect(queue.size()).toBe(2);
    expect(drainIds(queue)).toEqual(['a', 'c']);
  });

  it('reports the run position of a queued request', () => {
    const queue = new RequestQueue();
    queue.push(req('low', Priority.LOW));
    queue.push(req('high', Priority.HIGH));
    queue.push(req('normal', Priority.NORMAL));

    expect(queue.positionOf('high')).toBe(1);
    expect(queue.positionOf('normal')).toBe(2);
    expect(queue.positionOf('low')).toBe(3);
    expect(queue.positionOf('gone')).toBeUndefined();
  });

  it('snapshot returns run order without consuming', () => {
    const queue = new RequestQueue();
    queue.push(req('low', Priority.LOW));
    queue.push(req('critical', Priority.CRITICAL));

    expect(queue.snapshot().map((r) => r.id)).toEqual(['critical', 'low']);
    expect(queue.size()).toBe(2);
  });
});
