export type { NormalizedEvent, InboundMessage, EmitFn } from './event.js';
export type { ConnectionConfig, Credentials, TlsSettings, QoS } from './connection.js';
export type { BridgeState, BridgeStopReason, BridgeOutcome } from './bridge.js';
export { StartupError, TransportError, SinkError, QueueClosedError } from './errors.js';
export type { BrokerTransport, MessageHandler, CloseListener } from './transport.js';
