/**
 * A measurement value. Exactly one variant is populated per data point;
 * validation, alert evaluation and aggregation switch on `kind`.
 */
export type TelemetryValue =
  | { kind: 'numeric'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'json'; value: Record<string, unknown> };

export type TelemetryValueKind = TelemetryValue['kind'];

/** Value as it arrives on the wire. */
export type RawTelemetryValue = number | string | boolean | Record<string, unknown>;

export interface TelemetryDataPoint {
  timestamp: Date;
  metric_name: string;
  value: TelemetryValue;
  unit?: string | null;
  tags: Record<string, string>;
  metadata: Record<string, unknown>;
}

export interface StoredDataPoint extends TelemetryDataPoint {
  device_id: string;
}

function isPlainObject(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

export function isRawTelemetryValue(raw: unknown): raw is RawTelemetryValue {
  return (
    (typeof raw === 'number' && Number.isFinite(raw)) ||
    typeof raw === 'string' ||
    typeof raw === 'boolean' ||
    isPlainObject(raw)
  );
}

export function toTelemetryValue(raw: RawTelemetryValue): TelemetryValue {
  switch (typeof raw) {
    case 'number':
      return { kind: 'numeric', value: raw };
    case 'string':
      return { kind: 'string', value: raw };
    case 'boolean':
      return { kind: 'boolean', value: raw };
    default:
      return { kind: 'json', value: raw };
  }
}

export function fromTelemetryValue(value: TelemetryValue): RawTelemetryValue {
  return value.value;
}

export function numericValue(value: TelemetryValue): number | null {
  return value.kind === 'numeric' ? value.value : null;
}

/**
 * Canonical string form used for snapshots (`Alert.current_value`) and for
 * raw equality comparisons.
 */
export function formatTelemetryValue(value: TelemetryValue): string {
  switch (value.kind) {
    case 'numeric':
      return String(value.value);
    case 'string':
      return value.value;
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'json':
      return JSON.stringify(value.value);
  }
}
