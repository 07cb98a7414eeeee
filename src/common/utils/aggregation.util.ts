import { AggregationType } from '../types/telemetry.types';
import { TelemetryValue, numericValue } from '../types/telemetry-value.type';

/**
 * Continuous percentile with linear interpolation between closest ranks
 * (same result as PostgreSQL `percentile_cont`). `values` must be non-empty.
 */
export function percentile(values: number[], fraction: number): number {
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (sorted.length - 1) * fraction;
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  if (lower === upper) {
    return sorted[lower];
  }
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

/** Reduces a non-empty list of numeric values. */
export function reduceValues(values: number[], aggregation: AggregationType): number {
  switch (aggregation) {
    case 'avg':
      return values.reduce((sum, v) => sum + v, 0) / values.length;
    case 'min':
      return values.reduce((min, v) => (v < min ? v : min));
    case 'max':
      return values.reduce((max, v) => (v > max ? v : max));
    case 'sum':
      return values.reduce((sum, v) => sum + v, 0);
    case 'count':
      return values.length;
    case 'median':
      return percentile(values, 0.5);
    case 'p95':
      return percentile(values, 0.95);
    case 'p99':
      return percentile(values, 0.99);
  }
}

export interface AggregatedPoint {
  timestamp: Date;
  value: number;
}

export interface TimedValue {
  timestamp: Date;
  value: TelemetryValue;
}

/**
 * Buckets points into `[start + i*interval, start + (i+1)*interval)` for every
 * bucket starting before `end`, and reduces the numeric values of each.
 * Buckets without numeric values are left out; output is ascending by start.
 */
export function bucketAggregate(
  points: TimedValue[],
  aggregation: AggregationType,
  intervalSeconds: number,
  start: Date,
  end: Date,
): AggregatedPoint[] {
  const startMs = start.getTime();
  const endMs = end.getTime();
  const intervalMs = intervalSeconds * 1000;
  if (intervalMs <= 0 || endMs <= startMs) {
    return [];
  }

  const buckets = new Map<number, number[]>();
  for (const point of points) {
    const value = numericValue(point.value);
    const ts = point.timestamp.getTime();
    if (value === null || ts < startMs || ts > endMs) {
      continue;
    }
    const index = Math.floor((ts - startMs) / intervalMs);
    if (startMs + index * intervalMs >= endMs) {
      continue;
    }
    const values = buckets.get(index);
    if (values) {
      values.push(value);
    } else {
      buckets.set(index, [value]);
    }
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => a - b)
    .map(([index, values]) => ({
      timestamp: new Date(startMs + index * intervalMs),
      value: reduceValues(values, aggregation),
    }));
}
