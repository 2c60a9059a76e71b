import type { InboundMessage } from './event.js';
import type { QoS } from './connection.js';

/**
 * Handles one inbound message. The transport must not deliver the next
 * message of the subscription until the returned promise settles.
 */
export type MessageHandler = (message: InboundMessage) => Promise<void>;

/** Called once when the connection closes; `error` is the last transport error seen, if any. */
export type CloseListener = (error: Error | undefined) => void;

/**
 * The broker client as seen by the bridge.
 *
 * Implementations deliver messages for a subscribed topic in receipt
 * order and reject `connect()` on connection or authentication failure.
 */
export interface BrokerTransport {
  connect(): Promise<void>;
  subscribe(topic: string, qos: QoS, handler: MessageHandler): Promise<void>;
  unsubscribe(topic: string): Promise<void>;
  disconnect(): Promise<void>;
  onClose(listener: CloseListener): void;
}
