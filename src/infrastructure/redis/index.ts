export { default as redisPlugin } from './redis-plugin.js';
export { enqueueEvent, DEFAULT_STREAM_KEY, EVENT_TYPE } from './event-producer.js';
export type { StreamEntry } from './event-producer.js';
export { startForwarder } from './event-forwarder.js';
export type { ForwarderOptions } from './event-forwarder.js';
