import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InfluxDBClient, Point } from '@influxdata/influxdb3-client';
import {
  SeriesSummary,
  TimeSeriesQuery,
  TimeSeriesStore,
} from '../../common/interfaces/telemetry-stores.interface';
import { StoredDataPoint, TelemetryDataPoint, TelemetryValue } from '../../common/types/telemetry-value.type';

type QueryParams = Record<string, string | number | boolean>;

const MEASUREMENT = 'telemetry_data';

export function toDate(raw: unknown): Date | null {
  if (raw instanceof Date) {
    return raw;
  }
  if (typeof raw === 'bigint') {
    // nanosecond epoch
    return new Date(Number(raw / 1000000n));
  }
  if (typeof raw === 'number' || typeof raw === 'string') {
    const date = new Date(raw);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

function toNumber(raw: unknown): number {
  if (typeof raw === 'bigint') {
    return Number(raw);
  }
  return typeof raw === 'number' ? raw : 0;
}

function parseJsonObject(raw: unknown): Record<string, unknown> {
  if (typeof raw !== 'string' || raw === '') {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch {
    return {};
  }
}

function stringRecord(source: Record<string, unknown>): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string') {
      tags[key] = value;
    }
  }
  return tags;
}

/** Rebuilds the tagged value from the `value_type` discriminator and its slot. */
export function rowValue(row: Record<string, unknown>): TelemetryValue | null {
  switch (row.value_type) {
    case 'numeric':
      return typeof row.value_numeric === 'number' ? { kind: 'numeric', value: row.value_numeric } : null;
    case 'string':
      return typeof row.value_string === 'string' ? { kind: 'string', value: row.value_string } : null;
    case 'boolean':
      return typeof row.value_boolean === 'boolean' ? { kind: 'boolean', value: row.value_boolean } : null;
    case 'json':
      return { kind: 'json', value: parseJsonObject(row.value_json) };
    default:
      return null;
  }
}

export function rowToDataPoint(row: Record<string, unknown>): StoredDataPoint | null {
  const timestamp = toDate(row.time);
  const value = rowValue(row);
  if (!timestamp || !value || typeof row.device_id !== 'string' || typeof row.metric_name !== 'string') {
    return null;
  }

  return {
    device_id: row.device_id,
    metric_name: row.metric_name,
    timestamp,
    value,
    unit: typeof row.unit === 'string' && row.unit !== '' ? row.unit : null,
    tags: stringRecord(parseJsonObject(row.tags)),
    metadata: parseJsonObject(row.metadata),
  };
}

function inList(column: string, values: string[], params: QueryParams): string {
  const names = values.map((value, index) => {
    const name = `${column}_${index}`;
    params[name] = value;
    return `$${name}`;
  });
  return `${column} IN (${names.join(', ')})`;
}

@Injectable()
export class InfluxService implements TimeSeriesStore {
  private readonly logger = new Logger(InfluxService.name);
  private influx3Client: InfluxDBClient;
  private readonly database: string;

  constructor(private configService: ConfigService) {
    const host = this.configService.get<string>('INFLUXDB_URL') || 'http://localhost:8181';
    const token = this.configService.get<string>('INFLUXDB_TOKEN') || 'dummy-token-for-no-auth-mode';
    this.database = this.configService.get<string>('INFLUXDB_DATABASE') || 'telemetry';

    this.logger.log(`InfluxDB client configured for ${host} (database ${this.database})`);

    this.influx3Client = new InfluxDBClient({
      host,
      token,
      database: this.database,
    });
  }

  async writePoint(deviceId: string, dataPoint: TelemetryDataPoint): Promise<void> {
    const point = Point.measurement(MEASUREMENT)
      .setTag('device_id', deviceId)
      .setTag('metric_name', dataPoint.metric_name)
      .setStringField('value_type', dataPoint.value.kind)
      .setStringField('unit', dataPoint.unit || '')
      .setStringField('tags', JSON.stringify(dataPoint.tags))
      .setStringField('metadata', JSON.stringify(dataPoint.metadata))
      .setTimestamp(dataPoint.timestamp);

    switch (dataPoint.value.kind) {
      case 'numeric':
        point.setFloatField('value_numeric', dataPoint.value.value);
        break;
      case 'string':
        point.setStringField('value_string', dataPoint.value.value);
        break;
      case 'boolean':
        point.setBooleanField('value_boolean', dataPoint.value.value);
        break;
      case 'json':
        point.setStringField('value_json', JSON.stringify(dataPoint.value.value));
        break;
    }

    // Same series and timestamp overwrites the previous row
    await this.influx3Client.write([point], this.database);
  }

  async queryPoints(query: TimeSeriesQuery): Promise<StoredDataPoint[]> {
    const params: QueryParams = {
      start_time: query.start_time.toISOString(),
      end_time: query.end_time.toISOString(),
    };
    const conditions = ['time >= to_timestamp($start_time)', 'time <= to_timestamp($end_time)'];

    if (query.device_ids && query.device_ids.length > 0) {
      conditions.push(inList('device_id', query.device_ids, params));
    }
    if (query.metric_names && query.metric_names.length > 0) {
      conditions.push(inList('metric_name', query.metric_names, params));
    }

    const sqlQuery = `
      SELECT * FROM ${MEASUREMENT}
      WHERE ${conditions.join(' AND ')}
      ORDER BY time ASC
      LIMIT ${Math.max(1, Math.floor(query.limit))}
    `;

    const rows = await this.collect(sqlQuery, params);
    return this.toDataPoints(rows);
  }

  async getLatestPoint(deviceId: string, metricName: string, since: Date): Promise<StoredDataPoint | null> {
    const sqlQuery = `
      SELECT * FROM ${MEASUREMENT}
      WHERE device_id = $device_id
        AND metric_name = $metric_name
        AND time >= to_timestamp($since)
      ORDER BY time DESC
      LIMIT 1
    `;

    const rows = await this.collect(sqlQuery, {
      device_id: deviceId,
      metric_name: metricName,
      since: since.toISOString(),
    });
    return this.toDataPoints(rows)[0] ?? null;
  }

  async getDeviceMetricNames(deviceId: string): Promise<string[]> {
    const sqlQuery = `
      SELECT DISTINCT metric_name FROM ${MEASUREMENT}
      WHERE device_id = $device_id
      ORDER BY metric_name
    `;

    const rows = await this.collect(sqlQuery, { device_id: deviceId });
    return rows.flatMap(row => (typeof row.metric_name === 'string' ? [row.metric_name] : []));
  }

  async getSeriesSummaries(since: Date, deviceId?: string): Promise<SeriesSummary[]> {
    const params: QueryParams = { since: since.toISOString() };
    let where = '';
    if (deviceId) {
      params.device_id = deviceId;
      where = 'WHERE device_id = $device_id';
    }

    const sqlQuery = `
      SELECT
        device_id,
        metric_name,
        COUNT(*) AS total_points,
        SUM(CASE WHEN time >= to_timestamp($since) THEN 1 ELSE 0 END) AS recent_points,
        MAX(time) AS last_timestamp
      FROM ${MEASUREMENT}
      ${where}
      GROUP BY device_id, metric_name
    `;

    const rows = await this.collect(sqlQuery, params);
    return rows.flatMap(row =>
      typeof row.device_id === 'string' && typeof row.metric_name === 'string'
        ? [
            {
              device_id: row.device_id,
              metric_name: row.metric_name,
              total_points: toNumber(row.total_points),
              recent_points: toNumber(row.recent_points),
              last_timestamp: toDate(row.last_timestamp),
            },
          ]
        : [],
    );
  }

  async ping(): Promise<void> {
    await this.collect('SELECT 1 AS ok', {});
  }

  private async collect(sqlQuery: string, params: QueryParams): Promise<Record<string, unknown>[]> {
    const result: Record<string, unknown>[] = [];
    for await (const row of this.influx3Client.query(sqlQuery, this.database, { type: 'sql', params })) {
      result.push(row);
    }
    return result;
  }

  private toDataPoints(rows: Record<string, unknown>[]): StoredDataPoint[] {
    const points: StoredDataPoint[] = [];
    for (const row of rows) {
      const point = rowToDataPoint(row);
      if (point) {
        points.push(point);
      } else {
        this.logger.warn(`Skipping unreadable ${MEASUREMENT} row`);
      }
    }
    return points;
  }

  async onModuleDestroy() {
    await this.influx3Client.close();
  }
}
