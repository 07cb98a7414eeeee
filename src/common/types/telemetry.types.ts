export const DATA_TYPES = ['numeric', 'string', 'boolean', 'json', 'binary', 'geolocation', 'timestamp'] as const;
export type DataType = (typeof DATA_TYPES)[number];

export const METRIC_TYPES = ['gauge', 'counter', 'histogram', 'summary'] as const;
export type MetricType = (typeof METRIC_TYPES)[number];

export const ALERT_LEVELS = ['info', 'warning', 'error', 'critical', 'emergency'] as const;
export type AlertLevel = (typeof ALERT_LEVELS)[number];

export const ALERT_STATUSES = ['active', 'acknowledged', 'resolved', 'suppressed'] as const;
export type AlertStatus = (typeof ALERT_STATUSES)[number];

export const ALERT_CONDITIONS = ['>', '<', '==', '!='] as const;
export type AlertCondition = (typeof ALERT_CONDITIONS)[number];

export const AGGREGATION_TYPES = ['avg', 'min', 'max', 'sum', 'count', 'median', 'p95', 'p99'] as const;
export type AggregationType = (typeof AGGREGATION_TYPES)[number];

export const TIME_RANGES = ['1h', '6h', '24h', '7d', '30d', '90d'] as const;
export type TimeRange = (typeof TIME_RANGES)[number];

export const TIME_RANGE_SECONDS: Record<TimeRange, number> = {
  '1h': 3600,
  '6h': 6 * 3600,
  '24h': 24 * 3600,
  '7d': 7 * 86400,
  '30d': 30 * 86400,
  '90d': 90 * 86400,
};

/**
 * Outcome of an operation that performs an action. Failures carry a
 * human-readable message instead of an exception.
 */
export type OperationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
