import { describe, it, expect } from 'vitest';
import { decodePayload } from '../../src/application/decode-payload.js';

function decode(text: string) {
  return decodePayload(Buffer.from(text, 'utf-8'));
}

describe('decodePayload', () => {
  it('passes a JSON object through unchanged', () => {
    const result = decode('{"sensor_location": "room1", "value": 42}');
    expect(result.structured).toBe(true);
    expect(result.event).toEqual({ sensor_location: 'room1', value: 42 });
  });

  it('keeps nested structure', () => {
    const result = decode('{"reading":{"temp":21.5,"tags":["a","b"]},"ok":true,"note":null}');
    expect(result.event).toEqual({ reading: { temp: 21.5, tags: ['a', 'b'] }, ok: true, note: null });
  });

  it('does not re-wrap an object that already has a payload key', () => {
    const result = decode('{"payload":"inner"}');
    expect(result.structured).toBe(true);
    expect(result.event).toEqual({ payload: 'inner' });
  });

  it('wraps plain text', () => {
    const result = decode('ERROR: sensor offline');
    expect(result.structured).toBe(false);
    expect(result.event).toEqual({ payload: 'ERROR: sensor offline' });
  });

  it('wraps malformed JSON as text', () => {
    expect(decode('{"sensor": ').event).toEqual({ payload: '{"sensor": ' });
  });

  it('wraps an empty payload', () => {
    expect(decode('').event).toEqual({ payload: '' });
  });

  it('wraps JSON scalars', () => {
    expect(decode('42').event).toEqual({ payload: '42' });
    expect(decode('"hello"').event).toEqual({ payload: '"hello"' });
    expect(decode('null').event).toEqual({ payload: 'null' });
    expect(decode('true').event).toEqual({ payload: 'true' });
  });

  it('wraps JSON arrays', () => {
    const result = decode('[1,2,3]');
    expect(result.structured).toBe(false);
    expect(result.event).toEqual({ payload: '[1,2,3]' });
  });

  it('wraps bytes that are not valid UTF-8 as the raw buffer', () => {
    const raw = Buffer.from([0xff, 0xfe, 0x00, 0x41]);
    const result = decodePayload(raw);
    expect(result.structured).toBe(false);
    expect(result.event['payload']).toBe(raw);
  });

  it('keeps a leading byte order mark in the wrapped text', () => {
    const raw = Buffer.from([0xef, 0xbb, 0xbf, 0x68, 0x69]);
    expect(decodePayload(raw).event).toEqual({ payload: '\uFEFFhi' });
  });
});
