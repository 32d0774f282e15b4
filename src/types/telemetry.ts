/**
 * Telemetry record types.
 */

export type TelemetryValue = string | number | boolean | null;

export type TelemetryAttributes = Readonly<Record<string, TelemetryValue>>;

export type TelemetryMetrics = Readonly<Record<string, number>>;

export interface ITelemetryEvent {
  readonly timestamp: string;
  readonly event: string;
  readonly attributes: TelemetryAttributes;
  readonly metrics: TelemetryMetrics;
}
