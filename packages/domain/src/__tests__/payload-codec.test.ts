/**
 * Payload codec tests
 *
 * Fixed vectors computed by hand from the byte layout, plus a sweep over
 * every byte value in every position to show decoding never throws on
 * well-formed input.
 */

import { describe, it, expect } from '@jest/globals';
import { decodePayload, encodePayload, MalformedPayloadError } from '../index.js';

describe('decodePayload', () => {
  it('decodes whole-degree coordinates', () => {
    expect(decodePayload('1E003C0050')).toEqual({ longitude: 30, latitude: 60, battery: 80 });
  });

  it('adds the fractional byte as hundredths', () => {
    // 0x28 + 0x64/100 = 40 + 1.00; 0x00 + 0x64/100 = 1.00; battery 0x50
    expect(decodePayload('2864006450')).toEqual({ longitude: 41, latitude: 1, battery: 80 });
  });

  it('trims whitespace and accepts lower-case digits', () => {
    expect(decodePayload('  1e0a3c1964 \n')).toEqual({ longitude: 30.1, latitude: 60.25, battery: 100 });
  });

  it('lets a fractional byte above 99 carry past the integral part', () => {
    expect(decodePayload('00FF00FFFF')).toEqual({ longitude: 2.55, latitude: 2.55, battery: 255 });
  });

  it('rounds to two decimals', () => {
    const decoded = decodePayload('0A210B2132');
    expect(decoded.longitude).toBe(10.33);
    expect(decoded.latitude).toBe(11.33);
    expect(decoded.battery).toBe(50);
  });

  it.each([
    ['640032640164', 'too long'],
    ['1E003C00', 'too short'],
    ['', 'empty'],
    ['1E003C005G', 'non-hex digit'],
    ['1E-03C0050', 'sign character'],
    ['1E 03C0050', 'inner whitespace'],
  ])('rejects %p (%s)', (payload) => {
    expect(() => decodePayload(payload)).toThrow(MalformedPayloadError);
  });

  it('reports the normalized payload in the error message', () => {
    expect(() => decodePayload(' abc ')).toThrow('Invalid hex payload: ABC (expected 10 hex characters, got 3)');
  });

  it('is total over every byte value in every position', () => {
    for (let position = 0; position < 5; position++) {
      for (let byte = 0; byte <= 0xff; byte++) {
        const pairs = ['00', '00', '00', '00', '00'];
        pairs[position] = byte.toString(16).padStart(2, '0');
        const payload = pairs.join('');
        const first = decodePayload(payload);
        expect(decodePayload(payload)).toEqual(first);
        expect(first.battery).toBeGreaterThanOrEqual(0);
        expect(first.battery).toBeLessThanOrEqual(255);
      }
    }
  });
});

describe('encodePayload', () => {
  it('produces upper-case hex in payload order', () => {
    expect(encodePayload({ longitude: 24.94, latitude: 60.17, battery: 87 })).toBe('185E3C1157');
  });

  it('decodes back to the original reading', () => {
    const reading = { longitude: 24.94, latitude: 60.17, battery: 87 };
    const decoded = decodePayload(encodePayload(reading));
    expect(decoded.longitude).toBeCloseTo(reading.longitude, 2);
    expect(decoded.latitude).toBeCloseTo(reading.latitude, 2);
    expect(decoded.battery).toBe(reading.battery);
  });

  it('rounds coordinates to the nearest hundredth before encoding', () => {
    expect(encodePayload({ longitude: 1.996, latitude: 0, battery: 0 })).toBe('0200000000');
  });

  it('rejects values the layout cannot carry', () => {
    expect(() => encodePayload({ longitude: -1, latitude: 0, battery: 0 })).toThrow(RangeError);
    expect(() => encodePayload({ longitude: 0, latitude: 256, battery: 0 })).toThrow(RangeError);
    expect(() => encodePayload({ longitude: 0, latitude: 0, battery: 256 })).toThrow(RangeError);
    expect(() => encodePayload({ longitude: 0, latitude: 0, battery: 12.5 })).toThrow(RangeError);
  });
});
