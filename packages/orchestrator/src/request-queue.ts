import type { Request } from '@modelgate/core';
import { PRIORITY_RANK } from '@modelgate/core';

/**
 * Ordering used by the queue: priority rank first, then submission sequence.
 * Negative when `a` should run before `b`.
 */
export function compareRequests(a: Request, b: Request): number {
  const byRank = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  return byRank !== 0 ? byRank : a.sequence - b.sequence;
}

/**
 * Binary min-heap of pending requests ordered by {@link compareRequests}.
 *
 * Single consumer: only the coordinator's drain loop pops. Producers push
 * synchronously, so a pop can never observe a half-inserted request and no
 * request is returned twice.
 */
export class RequestQueue {
  private readonly heap: Request[] = [];

  /** O(log n). */
  push(request: Request): void {
    this.heap.push(request);
    this.siftUp(this.heap.length - 1);
  }

  /** Remove and return the next request to run, or undefined when empty. */
  popHighest(): Request | undefined {
    return this.removeAt(0);
  }

  peek(): Request | undefined {
    return this.heap[0];
  }

  size(): number {
    return this.heap.length;
  }

  /** Remove a pending request by id. O(n). */
  remove(requestId: string): Request | undefined {
    const index = this.heap.findIndex((r) => r.id === requestId);
    return index === -1 ? undefined : this.removeAt(index);
  }

  /** 1-based run position of a queued request, or undefined if not queued. */
  positionOf(requestId: string): number | undefined {
    const target = this.heap.find((r) => r.id === requestId);
    if (!target) return undefined;
    let ahead = 0;
    for (const other of this.heap) {
      if (compareRequests(other, target) < 0) ahead++;
    }
    return ahead + 1;
  }

  /** Pending requests in run order. Does not modify the queue. */
  snapshot(): Request[] {
    return [...this.heap].sort(compareRequests);
  }

  // ── Heap internals ──────────────────────────────────────────────────

  private removeAt(index: number): Request | undefined {
    const target = this.heap[index];
    const last = this.heap.pop();
    if (target === undefined || last === undefined) return undefined;
    if (index < this.heap.length) {
      this.heap[index] = last;
      this.siftDown(index);
      this.siftUp(index);
    }
    return target;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.before(child, parent)) break;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = 2 * parent + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < this.heap.length && this.before(left, smallest)) smallest = left;
      if (right < this.heap.length && this.before(right, smallest)) smallest = right;
      if (smallest === parent) return;
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private before(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    return a !== undefined && b !== undefined && compareRequests(a, b) < 0;
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) return;
    this.heap[i] = b;
    this.heap[j] = a;
  }
}
