import type { NormalizedEvent } from '../domain/index.js';

/** Key under which a non-object payload is wrapped. */
export const FALLBACK_KEY = 'payload';

export type DecodeResult =
  | { readonly structured: true; readonly event: NormalizedEvent }
  | { readonly structured: false; readonly event: NormalizedEvent };

// ignoreBOM keeps a leading BOM in the text, so the fallback carries the payload as sent
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes a raw message body into a normalized event.
 *
 * JSON objects pass through unchanged. Anything else (plain text,
 * malformed JSON, scalars, arrays, empty bodies) is wrapped as
 * `{ payload: <text> }`; bytes that are not valid UTF-8 are wrapped as
 * the raw Buffer. Never throws.
 */
export function decodePayload(payload: Buffer): DecodeResult {
  let text: string;
  try {
    text = utf8.decode(payload);
  } catch {
    return { structured: false, event: { [FALLBACK_KEY]: payload } };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { structured: false, event: { [FALLBACK_KEY]: text } };
  }

  if (isJsonObject(parsed)) {
    return { structured: true, event: parsed };
  }

  return { structured: false, event: { [FALLBACK_KEY]: text } };
}
