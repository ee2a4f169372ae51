import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import { loadConfig } from '../config/env.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({}, '/srv/telemetry')).toEqual({
      port: 8000,
      corsOrigin: '*',
      storage: { kind: 'sqlite', path: '/srv/telemetry/database.db' },
      mqtt: { enabled: true, url: 'mqtt://localhost:1883', topic: 'tc-bn/telemetry/+', clientId: undefined },
      processedHours: 12,
    });
  });

  it('selects postgres when DATABASE_URL is set', () => {
    const config = loadConfig({ DATABASE_URL: 'postgres://app:test-secret@db:5432/telemetry' }, '/srv');
    expect(config.storage).toEqual({ kind: 'postgres', connectionString: 'postgres://app:test-secret@db:5432/telemetry' });
  });

  it('resolves DATABASE_PATH against the working directory', () => {
    expect(loadConfig({ DATABASE_PATH: 'data/t.db' }, '/srv').storage).toEqual({ kind: 'sqlite', path: '/srv/data/t.db' });
  });

  it('builds the broker url from host and port', () => {
    const config = loadConfig({ MQTT_HOST: 'broker', MQTT_PORT: '8883', MQTT_TOPIC: 'site/+' });
    expect(config.mqtt.url).toBe('mqtt://broker:8883');
    expect(config.mqtt.topic).toBe('site/+');
  });

  it.each([
    ['0', false],
    ['false', false],
    ['No', false],
    [' OFF ', false],
    ['true', true],
    ['1', true],
    ['yes', true],
  ])('reads MQTT_ENABLED=%p as %p', (value, expected) => {
    expect(loadConfig({ MQTT_ENABLED: value }).mqtt.enabled).toBe(expected);
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ZodError);
    expect(() => loadConfig({ PROCESSED_HOURS: '0' })).toThrow(ZodError);
  });
});
