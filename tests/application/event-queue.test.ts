import { describe, it, expect } from 'vitest';
import { EventQueue } from '../../src/application/event-queue.js';
import { QueueClosedError } from '../../src/domain/index.js';
import { flush } from '../helpers.js';

describe('EventQueue', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new EventQueue<number>(0)).toThrow(RangeError);
    expect(() => new EventQueue<number>(1.5)).toThrow(RangeError);
  });

  it('hands items out in push order', async () => {
    const queue = new EventQueue<number>(10);
    await queue.push(1);
    await queue.push(2);
    await queue.push(3);

    expect(await queue.take()).toEqual({ done: false, value: 1 });
    expect(await queue.take()).toEqual({ done: false, value: 2 });
    expect(await queue.take()).toEqual({ done: false, value: 3 });
    expect(queue.size).toBe(0);
  });

  it('holds a push while full until an item is taken', async () => {
    const queue = new EventQueue<string>(1);
    await queue.push('first');

    let accepted = false;
    const pending = queue.push('second').then(() => {
      accepted = true;
    });

    await flush();
    expect(accepted).toBe(false);
    expect(queue.size).toBe(1);

    expect(await queue.take()).toEqual({ done: false, value: 'first' });
    await pending;
    expect(accepted).toBe(true);
    expect(await queue.take()).toEqual({ done: false, value: 'second' });
  });

  it('holds a take while empty until an item is pushed', async () => {
    const queue = new EventQueue<number>(2);
    const taken = queue.take();

    await queue.push(7);

    expect(await taken).toEqual({ done: false, value: 7 });
    expect(queue.size).toBe(0);
  });

  it('drains queued items after close, then reports done', async () => {
    const queue = new EventQueue<number>(5);
    await queue.push(1);
    await queue.push(2);
    queue.close();

    expect(await queue.take()).toEqual({ done: false, value: 1 });
    expect(await queue.take()).toEqual({ done: false, value: 2 });
    expect(await queue.take()).toEqual({ done: true, value: undefined });
  });

  it('rejects pushes after close', async () => {
    const queue = new EventQueue<number>(5);
    queue.close();

    await expect(queue.push(1)).rejects.toBeInstanceOf(QueueClosedError);
    expect(queue.isClosed).toBe(true);
  });

  it('rejects a push that was waiting for space when the queue closes', async () => {
    const queue = new EventQueue<number>(1);
    await queue.push(1);
    const waiting = queue.push(2);

    queue.close();

    await expect(waiting).rejects.toBeInstanceOf(QueueClosedError);
  });

  it('ends a waiting take on close', async () => {
    const queue = new EventQueue<number>(1);
    const taken = queue.take();

    queue.close();

    expect(await taken).toEqual({ done: true, value: undefined });
  });

  it('is async-iterable until closed', async () => {
    const queue = new EventQueue<number>(2);
    const seen: number[] = [];

    const consumer = (async () => {
      for await (const item of queue) {
        seen.push(item);
      }
    })();

    for (let i = 0; i < 5; i++) {
      await queue.push(i);
    }
    queue.close();
    await consumer;

    expect(seen).toEqual([0, 1, 2, 3, 4]);
  });
});
