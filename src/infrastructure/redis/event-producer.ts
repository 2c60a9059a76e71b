import { randomUUID } from 'node:crypto';
import type { Redis } from 'ioredis';
import type { NormalizedEvent } from '../../domain/index.js';

export const DEFAULT_STREAM_KEY = 'events_stream';

/** Event type recorded for every bridged message. */
export const EVENT_TYPE = 'mqtt_message';

/** One normalized event plus where it came from. */
export interface StreamEntry {
  readonly event: NormalizedEvent;
  readonly topic: string;
  readonly broker: string;
}

/**
 * Appends a normalized event to the engine's Redis Stream.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`). Redis Streams require
 * string values, so the event and its metadata are JSON-serialized; the
 * field layout matches what the event worker consumes.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueEvent(
  redis: Redis,
  streamKey: string,
  entry: StreamEntry,
  now: Date = new Date(),
): Promise<string> {
  const entryId = await redis.xadd(
    streamKey,
    '*',
    'event_id', randomUUID(),
    'event_type', EVENT_TYPE,
    'source', `mqtt:${entry.topic}`,
    'timestamp', now.toISOString(),
    'payload', JSON.stringify(entry.event),
    'metadata', JSON.stringify({ topic: entry.topic, broker: entry.broker }),
  );

  if (entryId === null) {
    throw new Error(`XADD to "${streamKey}" returned no entry id`);
  }
  return entryId;
}
