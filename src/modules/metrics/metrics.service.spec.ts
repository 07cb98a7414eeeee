import { Test, TestingModule } from '@nestjs/testing';
import { MetricsService } from './metrics.service';
import { EventNotifierService } from '../events/event-notifier.service';
import { METRIC_CATALOG } from '../../common/interfaces/telemetry-stores.interface';
import { FakeMetricCatalog } from '../../../test/mocks/telemetry-stores.fake';
import { createMockEventNotifier } from '../../../test/mocks/event-bus.mock';

describe('MetricsService', () => {
  let service: MetricsService;
  let catalog: FakeMetricCatalog;
  let notifier: ReturnType<typeof createMockEventNotifier>;

  beforeEach(async () => {
    catalog = new FakeMetricCatalog();
    notifier = createMockEventNotifier();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MetricsService,
        { provide: METRIC_CATALOG, useValue: catalog },
        { provide: EventNotifierService, useValue: notifier },
      ],
    }).compile();

    service = module.get<MetricsService>(MetricsService);
  });

  it('defines a metric with defaults', async () => {
    const result = await service.defineMetric({ name: 'temperature', data_type: 'numeric', unit: 'C' }, 'operator-1');

    if (!result.success) {
      throw new Error(result.error);
    }
    expect(result.data).toMatchObject({
      name: 'temperature',
      data_type: 'numeric',
      metric_type: 'gauge',
      unit: 'C',
      min_value: null,
      max_value: null,
      retention_days: 90,
      aggregation_interval: 60,
      created_by: 'operator-1',
    });
    expect(notifier.publish).toHaveBeenCalledWith(
      'metric.defined',
      expect.objectContaining({ metric_id: result.data.metric_id, name: 'temperature', unit: 'C' }),
    );
  });

  it('returns the stored definition for a repeated name', async () => {
    const first = await service.defineMetric({ name: 'temperature', data_type: 'numeric' }, 'operator-1');
    const second = await service.defineMetric({ name: 'temperature', data_type: 'string' }, 'operator-2');

    expect(first.success && second.success).toBe(true);
    if (first.success && second.success) {
      expect(second.data.metric_id).toBe(first.data.metric_id);
      expect(second.data.data_type).toBe('numeric');
    }
    expect(catalog.definitions.size).toBe(1);
    expect(notifier.publish).toHaveBeenCalledTimes(1);
  });

  it('deletes definitions by name', async () => {
    await service.defineMetric({ name: 'humidity', data_type: 'numeric' }, 'operator-1');

    expect(await service.deleteMetric('humidity')).toBe(true);
    expect(await service.deleteMetric('humidity')).toBe(false);
    expect(await service.getMetric('humidity')).toBeNull();
  });

  it('lists definitions by data type', async () => {
    await service.defineMetric({ name: 'status', data_type: 'string' }, 'operator-1');
    await service.defineMetric({ name: 'temperature', data_type: 'numeric' }, 'operator-1');
    await service.defineMetric({ name: 'pressure', data_type: 'numeric' }, 'operator-1');

    const metrics = await service.listMetrics({ data_type: 'numeric', limit: 100, offset: 0 });

    expect(metrics.map(metric => metric.name)).toEqual(['pressure', 'temperature']);
  });
});
