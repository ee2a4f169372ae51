export type TelemetrySource = 'mqtt' | 'http';

/**
 * Inbound telemetry as sent by a device, identical on both transports.
 * `id` is the device identifier; `date`/`time` are sender wall-clock strings.
 */
export interface TelemetryEnvelope {
  readonly id: string;
  readonly payload: string;
  readonly date: string;
  readonly time: string;
}
