import { describe, it, expect } from '@jest/globals';
import { decodePayload } from '@tc-telemetry/domain';
import { buildEnvelope, DeviceSimulator, formatDate, formatTime } from '../simulator.js';

describe('formatDate / formatTime', () => {
  it('zero-pads local calendar fields', () => {
    const at = new Date(2024, 0, 5, 7, 3, 9);
    expect(formatDate(at)).toBe('2024-01-05');
    expect(formatTime(at)).toBe('07:03:09');
  });
});

describe('buildEnvelope', () => {
  it('encodes the reading into a payload the API can decode', () => {
    const envelope = buildEnvelope('ESP32_A1B2C3', { longitude: 24.94, latitude: 60.17, battery: 87 }, new Date(2024, 4, 1, 10, 15, 0));

    expect(envelope).toEqual({
      id: 'ESP32_A1B2C3',
      payload: '185E3C1157',
      date: '2024-05-01',
      time: '10:15:00',
    });
    expect(decodePayload(envelope.payload)).toEqual({ longitude: 24.94, latitude: 60.17, battery: 87 });
  });
});

describe('DeviceSimulator', () => {
  it('replays the same track for the same seed', () => {
    const a = new DeviceSimulator({ startLat: 60.17, startLng: 24.94, seed: 9 });
    const b = new DeviceSimulator({ startLat: 60.17, startLng: 24.94, seed: 9 });
    const trackA = Array.from({ length: 10 }, () => a.step());
    const trackB = Array.from({ length: 10 }, () => b.step());
    expect(trackA).toEqual(trackB);
  });

  it('moves at most one hundredth of a degree per step', () => {
    const sim = new DeviceSimulator({ startLat: 60.17, startLng: 24.94, seed: 3 });
    const reading = sim.step();
    expect(Math.abs(reading.latitude - 60.17)).toBeLessThanOrEqual(0.0100001);
    expect(Math.abs(reading.longitude - 24.94)).toBeLessThanOrEqual(0.0100001);
  });

  it('drains the battery and recharges when it would go negative', () => {
    const sim = new DeviceSimulator({ startLat: 10, startLng: 10, seed: 1, drainPerTick: 40 });
    expect([sim.step(), sim.step(), sim.step(), sim.step()].map((r) => r.battery)).toEqual([60, 20, 100, 60]);
  });

  it('keeps coordinates inside the encodable range', () => {
    const sim = new DeviceSimulator({ startLat: -5, startLng: 300, seed: 5 });
    for (let i = 0; i < 50; i++) {
      const envelope = buildEnvelope('ESP32_000001', sim.step(), new Date(2024, 4, 1));
      const decoded = decodePayload(envelope.payload);
      expect(decoded.latitude).toBeGreaterThanOrEqual(0);
      expect(decoded.longitude).toBeLessThan(255);
    }
  });
});
