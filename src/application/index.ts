export { connectionConfigSchema, parseConnectionConfig } from './connection-schema.js';
export type { ConnectionConfigInput } from './connection-schema.js';
export { decodePayload, FALLBACK_KEY } from './decode-payload.js';
export type { DecodeResult } from './decode-payload.js';
export { EventQueue } from './event-queue.js';
export { EventBridge } from './event-bridge.js';
export type { TransportFactory } from './event-bridge.js';
export { superviseBridge, NO_RESTART } from './supervise-bridge.js';
export type { RestartPolicy } from './supervise-bridge.js';
export { sleep } from './sleep.js';
