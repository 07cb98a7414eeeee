import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ALERT_STORE,
  AlertStore,
  SeriesSummary,
  TIME_SERIES_STORE,
  TimeSeriesStore,
} from '../../common/interfaces/telemetry-stores.interface';
import { TELEMETRY_CONFIG, TelemetryConfig } from '../../config/telemetry.config';
import { RealtimeFanoutService } from '../realtime/realtime-fanout.service';
import { bucketAggregate } from '../../common/utils/aggregation.util';
import { toCsv } from '../../common/utils/csv.util';
import {
  RawTelemetryValue,
  StoredDataPoint,
  formatTelemetryValue,
  fromTelemetryValue,
} from '../../common/types/telemetry-value.type';
import { AggregationType, TIME_RANGE_SECONDS, TimeRange } from '../../common/types/telemetry.types';

const DAY_MS = 24 * 60 * 60 * 1000;
const BYTES_PER_POINT = 100;
const CSV_HEADER = ['timestamp', 'device_id', 'metric_name', 'value', 'unit', 'tags'];

export interface DataPointView {
  timestamp: string;
  device_id: string;
  metric_name: string;
  value: RawTelemetryValue;
  unit: string | null;
  tags: Record<string, string>;
  metadata: Record<string, unknown>;
}

export interface AggregatedSeries {
  device_id: string;
  metric_name: string;
  data: { timestamp: string; value: number }[];
}

export interface RangeQuery {
  device_ids?: string[];
  metric_names?: string[];
  start_time: Date;
  end_time: Date;
  aggregation?: AggregationType;
  interval?: number;
  limit: number;
}

export type RangeQueryResult =
  | { kind: 'raw'; start_time: string; end_time: string; count: number; data_points: DataPointView[] }
  | {
      kind: 'aggregated';
      start_time: string;
      end_time: string;
      aggregation: AggregationType;
      interval: number;
      count: number;
      series: AggregatedSeries[];
    };

export interface DeviceTelemetryStats {
  device_id: string;
  total_metrics: number;
  active_metrics: number;
  data_points_count: number;
  last_update: string | null;
  storage_size: number;
  last_24h_points: number;
  last_24h_alerts: number;
  top_metrics: { name: string; points: number }[];
}

export interface ServiceTelemetryStats {
  total_devices: number;
  active_devices: number;
  total_metrics: number;
  total_data_points: number;
  storage_size: number;
  points_per_second: number;
  last_24h_points: number;
  last_24h_alerts: number;
  active_alerts: number;
  realtime_subscriptions: number;
}

export function toDataPointView(point: StoredDataPoint): DataPointView {
  return {
    timestamp: point.timestamp.toISOString(),
    device_id: point.device_id,
    metric_name: point.metric_name,
    value: fromTelemetryValue(point.value),
    unit: point.unit ?? null,
    tags: point.tags,
    metadata: point.metadata,
  };
}

function latestOf(summaries: SeriesSummary[]): Date | null {
  let latest: Date | null = null;
  for (const summary of summaries) {
    if (summary.last_timestamp && (!latest || summary.last_timestamp > latest)) {
      latest = summary.last_timestamp;
    }
  }
  return latest;
}

@Injectable()
export class TelemetryQueryService {
  private readonly logger = new Logger(TelemetryQueryService.name);

  constructor(
    @Inject(TIME_SERIES_STORE) private readonly timeSeriesStore: TimeSeriesStore,
    @Inject(ALERT_STORE) private readonly alertStore: AlertStore,
    private readonly fanoutService: RealtimeFanoutService,
    @Inject(TELEMETRY_CONFIG) private readonly config: TelemetryConfig,
  ) {}

  async queryRange(query: RangeQuery): Promise<RangeQueryResult> {
    const window = { start_time: query.start_time.toISOString(), end_time: query.end_time.toISOString() };

    if (query.aggregation && query.interval) {
      const points = await this.timeSeriesStore.queryPoints({
        device_ids: query.device_ids,
        metric_names: query.metric_names,
        start_time: query.start_time,
        end_time: query.end_time,
        limit: this.config.aggregationFetchLimit,
      });
      const series = this.aggregateSeries(points, query.aggregation, query.interval, query.start_time, query.end_time);
      return {
        kind: 'aggregated',
        ...window,
        aggregation: query.aggregation,
        interval: query.interval,
        count: series.length,
        series,
      };
    }

    const points = await this.timeSeriesStore.queryPoints({
      device_ids: query.device_ids,
      metric_names: query.metric_names,
      start_time: query.start_time,
      end_time: query.end_time,
      limit: Math.min(query.limit, this.config.maxQueryPoints),
    });
    return { kind: 'raw', ...window, count: points.length, data_points: points.map(toDataPointView) };
  }

  async getLatest(deviceId: string, metricName: string): Promise<DataPointView | null> {
    const point = await this.timeSeriesStore.getLatestPoint(deviceId, metricName, new Date(Date.now() - DAY_MS));
    return point ? toDataPointView(point) : null;
  }

  async getDeviceMetrics(deviceId: string): Promise<string[]> {
    return await this.timeSeriesStore.getDeviceMetricNames(deviceId);
  }

  async getMetricRange(
    deviceId: string,
    metricName: string,
    timeRange: TimeRange,
    aggregation?: AggregationType,
    interval?: number,
  ): Promise<RangeQueryResult> {
    const end = new Date();
    const start = new Date(end.getTime() - TIME_RANGE_SECONDS[timeRange] * 1000);

    return await this.queryRange({
      device_ids: [deviceId],
      metric_names: [metricName],
      start_time: start,
      end_time: end,
      aggregation,
      interval: aggregation ? interval ?? 60 : undefined,
      limit: this.config.maxQueryPoints,
    });
  }

  async exportCsv(deviceIds: string[], metricNames: string[], start: Date, end: Date): Promise<string> {
    const points = await this.timeSeriesStore.queryPoints({
      device_ids: deviceIds,
      metric_names: metricNames,
      start_time: start,
      end_time: end,
      limit: this.config.maxQueryPoints,
    });

    const rows = points.map(point => [
      point.timestamp.toISOString(),
      point.device_id,
      point.metric_name,
      formatTelemetryValue(point.value),
      point.unit ?? '',
      JSON.stringify(point.tags),
    ]);
    this.logger.log(`Exported ${rows.length} data points to CSV`);
    return toCsv(CSV_HEADER, rows);
  }

  /** Null when the device has no stored data. */
  async getDeviceStats(deviceId: string): Promise<DeviceTelemetryStats | null> {
    const since = new Date(Date.now() - DAY_MS);
    const summaries = await this.timeSeriesStore.getSeriesSummaries(since, deviceId);
    if (summaries.length === 0) {
      return null;
    }

    const totalPoints = summaries.reduce((sum, s) => sum + s.total_points, 0);
    const lastUpdate = latestOf(summaries);
    const topMetrics = [...summaries]
      .sort((a, b) => b.total_points - a.total_points || a.metric_name.localeCompare(b.metric_name))
      .slice(0, 5)
      .map(s => ({ name: s.metric_name, points: s.total_points }));

    return {
      device_id: deviceId,
      total_metrics: summaries.length,
      active_metrics: summaries.filter(s => s.recent_points > 0).length,
      data_points_count: totalPoints,
      last_update: lastUpdate ? lastUpdate.toISOString() : null,
      storage_size: totalPoints * BYTES_PER_POINT,
      last_24h_points: summaries.reduce((sum, s) => sum + s.recent_points, 0),
      last_24h_alerts: await this.alertStore.countAlerts({ device_id: deviceId, start_time: since }),
      top_metrics: topMetrics,
    };
  }

  async getServiceStats(): Promise<ServiceTelemetryStats> {
    const since = new Date(Date.now() - DAY_MS);
    const summaries = await this.timeSeriesStore.getSeriesSummaries(since);

    const totalPoints = summaries.reduce((sum, s) => sum + s.total_points, 0);
    const recentPoints = summaries.reduce((sum, s) => sum + s.recent_points, 0);

    return {
      total_devices: new Set(summaries.map(s => s.device_id)).size,
      active_devices: new Set(summaries.filter(s => s.recent_points > 0).map(s => s.device_id)).size,
      total_metrics: new Set(summaries.map(s => s.metric_name)).size,
      total_data_points: totalPoints,
      storage_size: totalPoints * BYTES_PER_POINT,
      points_per_second: recentPoints / 86400,
      last_24h_points: recentPoints,
      last_24h_alerts: await this.alertStore.countAlerts({ start_time: since }),
      active_alerts: await this.alertStore.countAlerts({ status: 'active' }),
      realtime_subscriptions: this.fanoutService.count(),
    };
  }

  private aggregateSeries(
    points: StoredDataPoint[],
    aggregation: AggregationType,
    interval: number,
    start: Date,
    end: Date,
  ): AggregatedSeries[] {
    const groups = new Map<string, StoredDataPoint[]>();
    for (const point of points) {
      const key = `${point.device_id}\u0000${point.metric_name}`;
      const group = groups.get(key);
      if (group) {
        group.push(point);
      } else {
        groups.set(key, [point]);
      }
    }

    const series: AggregatedSeries[] = [];
    for (const group of groups.values()) {
      const data = bucketAggregate(group, aggregation, interval, start, end);
      if (data.length > 0) {
        series.push({
          device_id: group[0].device_id,
          metric_name: group[0].metric_name,
          data: data.map(bucket => ({ timestamp: bucket.timestamp.toISOString(), value: bucket.value })),
        });
      }
    }
    return series.sort(
      (a, b) => a.device_id.localeCompare(b.device_id) || a.metric_name.localeCompare(b.metric_name),
    );
  }
}
