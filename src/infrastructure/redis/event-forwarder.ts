import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { NormalizedEvent } from '../../domain/index.js';
import type { EventQueue } from '../../application/event-queue.js';
import { sleep } from '../../application/sleep.js';
import { enqueueEvent } from './event-producer.js';

export interface ForwarderOptions {
  readonly streamKey: string;
  /** Subscription topic, recorded as the event source. */
  readonly topic: string;
  /** Broker URL, recorded in event metadata. */
  readonly broker: string;
  readonly retryDelayMs: number;
  /**
   * Gives up on Redis: an XADD still pending is abandoned and nothing is
   * retried. The queue's own close() ends the loop once it is drained.
   */
  readonly signal: AbortSignal;
}

/**
 * Settles with `work`, or rejects as soon as `signal` aborts. `work` keeps
 * running; only the wait for it ends.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new Error('Forwarding aborted while waiting for Redis'));
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Drains the bridge's event queue into the Redis Stream, one event at a
 * time and in queue order.
 *
 * A failed XADD is retried for the same event after `retryDelayMs`, so a
 * Redis outage holds the queue (and, once it fills, the bridge) instead
 * of skipping events. Aborting `signal` stops both the retries and the
 * wait on an XADD that has not answered.
 *
 * Resolves with the number of events forwarded once the queue is closed
 * and drained.
 */
export async function startForwarder(
  queue: EventQueue<NormalizedEvent>,
  redis: Redis,
  log: Logger,
  options: ForwarderOptions,
): Promise<number> {
  let forwarded = 0;

  for await (const event of queue) {
    for (;;) {
      try {
        const entryId = await untilAborted(
          enqueueEvent(redis, options.streamKey, {
            event,
            topic: options.topic,
            broker: options.broker,
          }),
          options.signal,
        );
        forwarded++;
        log.debug({ entryId, stream: options.streamKey }, 'Event forwarded');
        break;
      } catch (err: unknown) {
        if (options.signal.aborted) {
          log.error(
            { err, stream: options.streamKey, abandoned: queue.size + 1 },
            'Forwarder stopped with an undelivered event',
          );
          return forwarded;
        }
        log.error(
          { err, stream: options.streamKey, retryInMs: options.retryDelayMs },
          'Failed to enqueue event, retrying',
        );
        await sleep(options.retryDelayMs, options.signal);
      }
    }
  }

  log.info({ forwarded, stream: options.streamKey }, 'Forwarder stopped');
  return forwarded;
}
