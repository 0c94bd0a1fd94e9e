import { describe, expect, it } from 'vitest';
import { SerialWriteQueue } from '../src/backend/writeQueue';

describe('SerialWriteQueue', () => {
  it('runs tasks in submission order', async () => {
    const queue = new SerialWriteQueue();
    const order: number[] = [];
    await Promise.all([1, 2, 3].map((n) => queue.enqueue(`task ${n}`, () => order.push(n))));
    expect(order).toEqual([1, 2, 3]);
  });

  it('keeps going after a failing task', async () => {
    const queue = new SerialWriteQueue();
    const failing = queue.enqueue('boom', () => {
      throw new Error('constraint failed');
    });
    const next = queue.enqueue('after', () => 'ok');
    await expect(failing).rejects.toThrow('constraint failed');
    await expect(next).resolves.toBe('ok');
  });

  it('refuses work once drained', async () => {
    const queue = new SerialWriteQueue();
    await expect(queue.drain(100)).resolves.toBe(true);
    await expect(queue.enqueue('late', () => 1)).rejects.toThrow('Write queue is closed; dropped "late"');
  });

  it('abandons queued tasks when the drain bound passes', async () => {
    const queue = new SerialWriteQueue();
    const slow = queue
      .enqueue('slow', () => {
        const until = Date.now() + 30;
        while (Date.now() < until) {
          // hold the event loop past the drain bound
        }
        return 'slow done';
      })
      .catch(() => 'abandoned');
    const second = queue.enqueue('second', () => 'second done');

    await expect(queue.drain(5)).resolves.toBe(false);
    await expect(second).rejects.toThrow('Write abandoned at shutdown: second');
    await slow;
  });
});
