import { describe, it, expect } from 'vitest';
import { AsyncEventQueue } from '../src/async-event-queue.js';

describe('AsyncEventQueue', () => {
  it('yields pushed items in order, then ends on complete', async () => {
    const queue = new AsyncEventQueue<string>();
    queue.push('r1');
    queue.push('r2');
    queue.complete();

    const items: string[] = [];
    for await (const item of queue) {
      items.push(item);
    }
    expect(items).toEqual(['r1', 'r2']);
  });

  it('resolves a waiting consumer when an item is pushed', async () => {
    const queue = new AsyncEventQueue<number>();
    const iter = queue[Symbol.asyncIterator]();

    const pending = iter.next();
    queue.push(7);

    expect(await pending).toEqual({ value: 7, done: false });
    expect(queue.pendingCount).toBe(0);
  });

  it('ends a waiting consumer on complete', async () => {
    const queue = new AsyncEventQueue<number>();
    const iter = queue[Symbol.asyncIterator]();

    const pending = iter.next();
    queue.complete();

    expect((await pending).done).toBe(true);
    expect(queue.closed).toBe(true);
  });

  it('ignores push after complete', async () => {
    const queue = new AsyncEventQueue<number>();
    queue.push(1);
    queue.complete();
    queue.push(2);

    const items: number[] = [];
    for await (const item of queue) {
      items.push(item);
    }
    expect(items).toEqual([1]);
  });

  it('closes when the consumer breaks out of for-await', async () => {
    const queue = new AsyncEventQueue<number>();
    queue.push(1);
    queue.push(2);

    for await (const item of queue) {
      expect(item).toBe(1);
      break;
    }

    expect(queue.closed).toBe(true);
    expect(queue.pendingCount).toBe(0);
    queue.push(3);
    expect(queue.pendingCount).toBe(0);
  });
});
