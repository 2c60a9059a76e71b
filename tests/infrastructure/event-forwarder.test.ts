import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Redis } from 'ioredis';
import { startForwarder } from '../../src/infrastructure/redis/event-forwarder.js';
import { EventQueue } from '../../src/application/event-queue.js';
import type { NormalizedEvent } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

const PAYLOAD_ARG = 11;

describe('startForwarder', () => {
  let queue: EventQueue<NormalizedEvent>;
  let log: ReturnType<typeof fakeLogger>;
  let ac: AbortController;

  const options = () => ({
    streamKey: 'events_stream',
    topic: 'anomaly-data-out',
    broker: 'mqtt://localhost:1883',
    retryDelayMs: 0,
    signal: ac.signal,
  });

  beforeEach(() => {
    queue = new EventQueue<NormalizedEvent>(10);
    log = fakeLogger();
    ac = new AbortController();
  });

  it('forwards queued events in order and stops when the queue closes', async () => {
    const xadd = vi.fn().mockResolvedValue('1-0');
    const redis = { xadd } as unknown as Redis;

    await queue.push({ n: 1 });
    await queue.push({ payload: 'raw' });
    await queue.push({ n: 3 });
    queue.close();

    const forwarded = await startForwarder(queue, redis, log, options());

    expect(forwarded).toBe(3);
    expect(xadd.mock.calls.map((call) => call[PAYLOAD_ARG])).toEqual([
      '{"n":1}',
      '{"payload":"raw"}',
      '{"n":3}',
    ]);
    expect(log.info).toHaveBeenCalledWith(
      { forwarded: 3, stream: 'events_stream' },
      'Forwarder stopped',
    );
  });

  it('retries the same event after a failed XADD', async () => {
    const xadd = vi.fn()
      .mockRejectedValueOnce(new Error('READONLY'))
      .mockResolvedValue('1-0');
    const redis = { xadd } as unknown as Redis;

    await queue.push({ n: 1 });
    await queue.push({ n: 2 });
    queue.close();

    const forwarded = await startForwarder(queue, redis, log, options());

    expect(forwarded).toBe(2);
    expect(xadd.mock.calls.map((call) => call[PAYLOAD_ARG])).toEqual(['{"n":1}', '{"n":1}', '{"n":2}']);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error), retryInMs: 0 }),
      'Failed to enqueue event, retrying',
    );
  });

  it('gives up on the current event once aborted', async () => {
    const xadd = vi.fn().mockRejectedValue(new Error('connection lost'));
    const redis = { xadd } as unknown as Redis;

    await queue.push({ n: 1 });
    ac.abort();

    const forwarded = await startForwarder(queue, redis, log, options());

    expect(forwarded).toBe(0);
    expect(xadd).toHaveBeenCalledTimes(1);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ stream: 'events_stream' }),
      'Forwarder stopped with an undelivered event',
    );
  });

  it('stops waiting on an XADD that never answers once aborted', async () => {
    const xadd = vi.fn().mockReturnValue(new Promise<string>(() => undefined));
    const redis = { xadd } as unknown as Redis;

    await queue.push({ n: 1 });
    await queue.push({ n: 2 });
    const running = startForwarder(queue, redis, log, options());
    await vi.waitFor(() => expect(xadd).toHaveBeenCalledTimes(1));

    ac.abort();
    queue.close();

    expect(await running).toBe(0);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ stream: 'events_stream', abandoned: 2 }),
      'Forwarder stopped with an undelivered event',
    );
  });

  it('forwards events pushed while it is running', async () => {
    const xadd = vi.fn().mockResolvedValue('1-0');
    const redis = { xadd } as unknown as Redis;

    const running = startForwarder(queue, redis, log, options());
    await queue.push({ live: true });
    await vi.waitFor(() => expect(xadd).toHaveBeenCalledTimes(1));
    queue.close();

    expect(await running).toBe(1);
  });
});
