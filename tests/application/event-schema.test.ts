import { describe, it, expect } from 'vitest';
import { decodeEvent } from '../../src/application/event-schema.js';
import { EventDecodeError } from '../../src/application/errors.js';

describe('decodeEvent', () => {
  it('decodes a well-formed envelope', () => {
    const result = decodeEvent('{"deviceId":"d1","creationTime":1000,"data":{"temperature":21.5,"motion":false}}');

    expect(result).toEqual({
      ok: true,
      event: { deviceId: 'd1', creationTime: 1000, data: { temperature: 21.5, motion: false } },
    });
  });

  it('decodes a Buffer body', () => {
    const result = decodeEvent(Buffer.from('{"deviceId":"d2","creationTime":5,"data":{}}', 'utf-8'));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.event.deviceId).toBe('d2');
    }
  });

  it('keeps nested data values as-is', () => {
    const result = decodeEvent('{"deviceId":"d1","creationTime":1,"data":{"gps":{"lat":1.5,"lon":2}}}');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.event.data).toEqual({ gps: { lat: 1.5, lon: 2 } });
    }
  });

  it('accepts an empty deviceId (unknown device)', () => {
    const result = decodeEvent('{"deviceId":"","creationTime":1,"data":{}}');
    expect(result.ok).toBe(true);
  });

  it('drops unknown envelope fields', () => {
    const result = decodeEvent('{"deviceId":"d1","creationTime":1,"data":{},"extra":true}');

    expect(result).toEqual({ ok: true, event: { deviceId: 'd1', creationTime: 1, data: {} } });
  });

  it('drops a top-level __proto__ key from data', () => {
    const result = decodeEvent('{"deviceId":"d1","creationTime":1,"data":{"__proto__":{"x":1},"y":2}}');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(Object.keys(result.event.data)).toEqual(['y']);
      expect(Object.getPrototypeOf(result.event.data)).toBe(Object.prototype);
    }
  });

  it('rejects a body missing creationTime', () => {
    const result = decodeEvent('{"deviceId": "x"}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(EventDecodeError);
      expect(result.error.issues).toContain('creationTime: Required');
      expect(result.error.issues).toContain('data: Required');
    }
  });

  it('rejects malformed JSON', () => {
    const result = decodeEvent('{"deviceId":');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message.startsWith('Malformed JSON:')).toBe(true);
      expect(result.error.issues).toEqual([]);
    }
  });

  it('rejects an empty body', () => {
    expect(decodeEvent('').ok).toBe(false);
  });

  it('rejects a non-integer creationTime', () => {
    expect(decodeEvent('{"deviceId":"d1","creationTime":1.5,"data":{}}').ok).toBe(false);
  });

  it('rejects a string creationTime', () => {
    expect(decodeEvent('{"deviceId":"d1","creationTime":"1000","data":{}}').ok).toBe(false);
  });

  it('rejects a numeric deviceId', () => {
    expect(decodeEvent('{"deviceId":7,"creationTime":1,"data":{}}').ok).toBe(false);
  });

  it('rejects data that is an array', () => {
    expect(decodeEvent('{"deviceId":"d1","creationTime":1,"data":[1,2]}').ok).toBe(false);
  });

  it('rejects data that is null', () => {
    expect(decodeEvent('{"deviceId":"d1","creationTime":1,"data":null}').ok).toBe(false);
  });

  it('rejects a top-level array', () => {
    const result = decodeEvent('[]');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues).toEqual(['(root): Expected object, received array']);
    }
  });
});
