import path from 'node:path';
import { z } from 'zod';

const DISABLED_VALUES = new Set(['0', 'false', 'no', 'off']);

/** Unset means enabled; only an explicit 0/false/no/off turns the flag off. */
const enabledFlag = z
  .string()
  .optional()
  .transform((value) => value === undefined || !DISABLED_VALUES.has(value.trim().toLowerCase()));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  CORS_ORIGIN: z.string().default('*'),
  DATABASE_PATH: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),
  MQTT_HOST: z.string().min(1).default('localhost'),
  MQTT_PORT: z.coerce.number().int().min(1).max(65_535).default(1883),
  MQTT_ENABLED: enabledFlag,
  MQTT_TOPIC: z.string().min(1).default('tc-bn/telemetry/+'),
  MQTT_CLIENT_ID: z.string().min(1).optional(),
  PROCESSED_HOURS: z.coerce.number().int().min(1).default(12),
});

export type StorageConfig =
  | { kind: 'sqlite'; path: string }
  | { kind: 'postgres'; connectionString: string };

export interface MqttConfig {
  enabled: boolean;
  url: string;
  topic: string;
  clientId?: string;
}

export interface AppConfig {
  port: number;
  corsOrigin: string;
  storage: StorageConfig;
  mqtt: MqttConfig;
  /** Hour buckets in the processed CSV export. */
  processedHours: number;
}

/**
 * Parse the process environment once at startup.
 * Throws a ZodError describing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = envSchema.parse(env);

  const storage: StorageConfig = parsed.DATABASE_URL
    ? { kind: 'postgres', connectionString: parsed.DATABASE_URL }
    : { kind: 'sqlite', path: path.resolve(cwd, parsed.DATABASE_PATH ?? 'database.db') };

  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    storage,
    mqtt: {
      enabled: parsed.MQTT_ENABLED,
      url: `mqtt://${parsed.MQTT_HOST}:${parsed.MQTT_PORT}`,
      topic: parsed.MQTT_TOPIC,
      clientId: parsed.MQTT_CLIENT_ID,
    },
    processedHours: parsed.PROCESSED_HOURS,
  };
}
