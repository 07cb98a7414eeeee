import { Test, TestingModule } from '@nestjs/testing';
import { TelemetryQueryService } from './telemetry-query.service';
import { RealtimeFanoutService } from '../realtime/realtime-fanout.service';
import { ALERT_STORE, TIME_SERIES_STORE } from '../../common/interfaces/telemetry-stores.interface';
import { TELEMETRY_CONFIG } from '../../config/telemetry.config';
import { TelemetryValue } from '../../common/types/telemetry-value.type';
import { FakeAlertStore, FakeTimeSeriesStore } from '../../../test/mocks/telemetry-stores.fake';
import { createTestConfig } from '../../../test/mocks/telemetry-config.mock';

const NOW = new Date('2024-01-02T00:00:00Z');

describe('TelemetryQueryService', () => {
  let service: TelemetryQueryService;
  let timeSeries: FakeTimeSeriesStore;
  let alertStore: FakeAlertStore;
  const fanout = { count: jest.fn() };

  const write = (
    deviceId: string,
    metric: string,
    iso: string,
    value: TelemetryValue,
    unit: string | null = null,
    tags: Record<string, string> = {},
  ) => timeSeries.writePoint(deviceId, { timestamp: new Date(iso), metric_name: metric, value, unit, tags, metadata: {} });

  beforeEach(async () => {
    timeSeries = new FakeTimeSeriesStore();
    alertStore = new FakeAlertStore();
    fanout.count.mockReturnValue(4);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TelemetryQueryService,
        { provide: TIME_SERIES_STORE, useValue: timeSeries },
        { provide: ALERT_STORE, useValue: alertStore },
        { provide: RealtimeFanoutService, useValue: fanout },
        { provide: TELEMETRY_CONFIG, useValue: createTestConfig({ maxQueryPoints: 2 }) },
      ],
    }).compile();

    service = module.get<TelemetryQueryService>(TelemetryQueryService);
    jest.spyOn(Date, 'now').mockReturnValue(NOW.getTime());
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('queryRange', () => {
    it('caps raw results at the configured maximum', async () => {
      await write('device-1', 'temperature', '2024-01-01T00:00:00Z', { kind: 'numeric', value: 1 });
      await write('device-1', 'temperature', '2024-01-01T00:01:00Z', { kind: 'numeric', value: 2 });
      await write('device-1', 'temperature', '2024-01-01T00:02:00Z', { kind: 'numeric', value: 3 });

      const result = await service.queryRange({
        device_ids: ['device-1'],
        start_time: new Date('2024-01-01T00:00:00Z'),
        end_time: new Date('2024-01-01T01:00:00Z'),
        limit: 1000,
      });

      if (result.kind !== 'raw') {
        throw new Error('expected raw result');
      }
      expect(result.count).toBe(2);
      expect(result.data_points.map(point => point.value)).toEqual([1, 2]);
    });

    it('aggregates per device and metric', async () => {
      await write('device-1', 'temperature', '2024-01-01T00:00:10Z', { kind: 'numeric', value: 10 });
      await write('device-1', 'temperature', '2024-01-01T00:00:50Z', { kind: 'numeric', value: 20 });
      await write('device-1', 'temperature', '2024-01-01T00:01:30Z', { kind: 'numeric', value: 30 });
      await write('device-2', 'temperature', '2024-01-01T00:00:30Z', { kind: 'numeric', value: 5 });

      const result = await service.queryRange({
        metric_names: ['temperature'],
        start_time: new Date('2024-01-01T00:00:00Z'),
        end_time: new Date('2024-01-01T00:02:00Z'),
        aggregation: 'avg',
        interval: 60,
        limit: 1000,
      });

      expect(result).toEqual({
        kind: 'aggregated',
        start_time: '2024-01-01T00:00:00.000Z',
        end_time: '2024-01-01T00:02:00.000Z',
        aggregation: 'avg',
        interval: 60,
        count: 2,
        series: [
          {
            device_id: 'device-1',
            metric_name: 'temperature',
            data: [
              { timestamp: '2024-01-01T00:00:00.000Z', value: 15 },
              { timestamp: '2024-01-01T00:01:00.000Z', value: 30 },
            ],
          },
          {
            device_id: 'device-2',
            metric_name: 'temperature',
            data: [{ timestamp: '2024-01-01T00:00:00.000Z', value: 5 }],
          },
        ],
      });
    });
  });

  describe('getLatest', () => {
    it('returns the newest point of the last day', async () => {
      await write('device-1', 'temperature', '2024-01-01T10:00:00Z', { kind: 'numeric', value: 20 });
      await write('device-1', 'temperature', '2024-01-01T11:00:00Z', { kind: 'numeric', value: 22 }, 'C');

      expect(await service.getLatest('device-1', 'temperature')).toEqual({
        timestamp: '2024-01-01T11:00:00.000Z',
        device_id: 'device-1',
        metric_name: 'temperature',
        value: 22,
        unit: 'C',
        tags: {},
        metadata: {},
      });
    });

    it('ignores points older than a day', async () => {
      await write('device-1', 'temperature', '2023-12-31T10:00:00Z', { kind: 'numeric', value: 20 });

      expect(await service.getLatest('device-1', 'temperature')).toBeNull();
    });
  });

  describe('exportCsv', () => {
    it('writes one row per point', async () => {
      await write('device-1', 'temperature', '2024-01-01T10:00:00Z', { kind: 'numeric', value: 21.5 }, 'C', {
        site: 'north',
      });
      await write('device-1', 'status', '2024-01-01T10:01:00Z', { kind: 'string', value: 'on' });

      const csv = await service.exportCsv(
        ['device-1'],
        [],
        new Date('2024-01-01T00:00:00Z'),
        new Date('2024-01-01T23:59:59Z'),
      );

      expect(csv).toBe(
        'timestamp,device_id,metric_name,value,unit,tags\r\n' +
          '2024-01-01T10:00:00.000Z,device-1,temperature,21.5,C,"{""site"":""north""}"\r\n' +
          '2024-01-01T10:01:00.000Z,device-1,status,on,,{}\r\n',
      );
    });
  });

  describe('getDeviceStats', () => {
    it('summarises stored series and recent alerts', async () => {
      await write('device-1', 'temperature', '2023-12-30T12:00:00Z', { kind: 'numeric', value: 18 });
      await write('device-1', 'temperature', '2024-01-01T12:00:00Z', { kind: 'numeric', value: 20 });
      await write('device-1', 'humidity', '2024-01-01T18:00:00Z', { kind: 'numeric', value: 40 });
      await write('device-2', 'humidity', '2024-01-01T18:00:00Z', { kind: 'numeric', value: 41 });
      await alertStore.createAlert({
        rule_id: 'rule-1',
        rule_name: 'High temperature',
        device_id: 'device-1',
        metric_name: 'temperature',
        level: 'warning',
        status: 'active',
        message: 'Alert triggered: High temperature',
        current_value: '90',
        threshold_value: '80',
        triggered_at: new Date('2024-01-01T06:00:00Z'),
        auto_resolve_at: null,
        affected_devices_count: 1,
        tags: [],
        metadata: {},
      });

      expect(await service.getDeviceStats('device-1')).toEqual({
        device_id: 'device-1',
        total_metrics: 2,
        active_metrics: 2,
        data_points_count: 3,
        last_update: '2024-01-01T18:00:00.000Z',
        storage_size: 300,
        last_24h_points: 2,
        last_24h_alerts: 1,
        top_metrics: [
          { name: 'temperature', points: 2 },
          { name: 'humidity', points: 1 },
        ],
      });
    });

    it('returns null for a device without data', async () => {
      expect(await service.getDeviceStats('device-9')).toBeNull();
    });
  });

  describe('getServiceStats', () => {
    it('aggregates over all devices', async () => {
      await write('device-1', 'temperature', '2023-12-30T12:00:00Z', { kind: 'numeric', value: 18 });
      await write('device-2', 'humidity', '2024-01-01T18:00:00Z', { kind: 'numeric', value: 41 });

      const stats = await service.getServiceStats();

      expect(stats).toEqual({
        total_devices: 2,
        active_devices: 1,
        total_metrics: 2,
        total_data_points: 2,
        storage_size: 200,
        points_per_second: 1 / 86400,
        last_24h_points: 1,
        last_24h_alerts: 0,
        active_alerts: 0,
        realtime_subscriptions: 4,
      });
    });
  });
});
