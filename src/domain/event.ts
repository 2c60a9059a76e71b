/**
 * Core domain types for the bridge's event model.
 *
 * These types describe what arrives from the broker and what is handed
 * to the rule-evaluation engine. They carry no framework dependencies.
 */

/**
 * Event handed to the consuming engine.
 *
 * Either the decoded JSON object of a message, or `{ payload }` wrapping
 * the raw message body when it is not a JSON object.
 */
export type NormalizedEvent = Record<string, unknown>;

/** A message as delivered by the broker transport. Transient. */
export interface InboundMessage {
  readonly topic: string;
  readonly payload: Buffer;
}

/**
 * Sink the bridge emits into. Awaited: the next message is not dispatched
 * until the returned promise settles.
 */
export type EmitFn = (event: NormalizedEvent) => void | Promise<void>;
