import { Test, TestingModule } from '@nestjs/testing';
import { AlertEvaluatorService } from './alert-evaluator.service';
import { EventNotifierService } from '../events/event-notifier.service';
import { ALERT_RULE_STORE, ALERT_STORE, NewAlertRule } from '../../common/interfaces/telemetry-stores.interface';
import { TELEMETRY_CONFIG, TelemetryConfig } from '../../config/telemetry.config';
import { TelemetryDataPoint } from '../../common/types/telemetry-value.type';
import { FakeAlertRuleStore, FakeAlertStore } from '../../../test/mocks/telemetry-stores.fake';
import { createMockEventNotifier } from '../../../test/mocks/event-bus.mock';
import { createTestConfig } from '../../../test/mocks/telemetry-config.mock';

const baseRule: NewAlertRule = {
  name: 'High temperature',
  description: null,
  metric_name: 'temperature',
  condition: '>',
  threshold_value: '80',
  evaluation_window: 300,
  trigger_count: 1,
  level: 'warning',
  device_ids: [],
  device_groups: [],
  device_filters: {},
  notification_channels: [],
  cooldown_minutes: 15,
  auto_resolve: true,
  auto_resolve_timeout: 3600,
  enabled: true,
  tags: [],
  created_by: 'test-user',
};

const reading = (value: number, metric = 'temperature'): TelemetryDataPoint => ({
  timestamp: new Date('2024-01-01T00:00:00Z'),
  metric_name: metric,
  value: { kind: 'numeric', value },
  unit: 'C',
  tags: {},
  metadata: {},
});

describe('AlertEvaluatorService', () => {
  let service: AlertEvaluatorService;
  let ruleStore: FakeAlertRuleStore;
  let alertStore: FakeAlertStore;
  let notifier: ReturnType<typeof createMockEventNotifier>;

  const build = async (config: TelemetryConfig = createTestConfig()) => {
    ruleStore = new FakeAlertRuleStore();
    alertStore = new FakeAlertStore();
    notifier = createMockEventNotifier();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AlertEvaluatorService,
        { provide: ALERT_RULE_STORE, useValue: ruleStore },
        { provide: ALERT_STORE, useValue: alertStore },
        { provide: EventNotifierService, useValue: notifier },
        { provide: TELEMETRY_CONFIG, useValue: config },
      ],
    }).compile();

    service = module.get<AlertEvaluatorService>(AlertEvaluatorService);
  };

  beforeEach(async () => {
    await build();
  });

  it('creates an alert when the threshold is crossed', async () => {
    const rule = await ruleStore.createAlertRule(baseRule);

    const alerts = await service.check('device-1', reading(85));

    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({
      rule_id: rule.rule_id,
      rule_name: 'High temperature',
      device_id: 'device-1',
      metric_name: 'temperature',
      level: 'warning',
      status: 'active',
      message: 'Alert triggered: High temperature',
      current_value: '85',
      threshold_value: '80',
      metadata: { trigger_value: 85, data_timestamp: '2024-01-01T00:00:00.000Z' },
    });
    expect(alerts[0].auto_resolve_at?.getTime()).toBe(alerts[0].triggered_at.getTime() + 3600 * 1000);
    expect(rule.total_triggers).toBe(1);
    expect(rule.last_triggered).toEqual(alerts[0].triggered_at);
    expect(notifier.publish).toHaveBeenCalledWith(
      'alert.triggered',
      expect.objectContaining({ alert_id: alerts[0].alert_id, device_id: 'device-1', current_value: '85' }),
    );
  });

  it('does nothing when the condition does not hold', async () => {
    const rule = await ruleStore.createAlertRule(baseRule);

    expect(await service.check('device-1', reading(75))).toEqual([]);
    expect(alertStore.alerts.size).toBe(0);
    expect(rule.total_triggers).toBe(0);
    expect(notifier.publish).not.toHaveBeenCalled();
  });

  it('only applies scoped rules to their devices', async () => {
    await ruleStore.createAlertRule({ ...baseRule, device_ids: ['device-2'] });

    expect(await service.check('device-1', reading(90))).toEqual([]);
    expect(await service.check('device-2', reading(90))).toHaveLength(1);
  });

  it('ignores disabled rules and other metrics', async () => {
    await ruleStore.createAlertRule({ ...baseRule, enabled: false });
    await ruleStore.createAlertRule({ ...baseRule, metric_name: 'humidity' });

    expect(await service.check('device-1', reading(90))).toEqual([]);
  });

  it('counts every match when cooldown is off', async () => {
    const rule = await ruleStore.createAlertRule({ ...baseRule, cooldown_minutes: 0 });

    for (let i = 0; i < 3; i++) {
      await service.check('device-1', reading(90 + i));
    }

    expect(rule.total_triggers).toBe(3);
    expect(alertStore.alerts.size).toBe(3);
  });

  it('suppresses matches inside the cooldown window', async () => {
    const rule = await ruleStore.createAlertRule(baseRule);

    await service.check('device-1', reading(90));
    await service.check('device-1', reading(95));

    expect(rule.total_triggers).toBe(1);
    expect(alertStore.alerts.size).toBe(1);
  });

  it('lets only one of two concurrent matches through the cooldown', async () => {
    const rule = await ruleStore.createAlertRule(baseRule);

    const [first, second] = await Promise.all([
      service.check('device-1', reading(90)),
      service.check('device-2', reading(91)),
    ]);

    expect(first.length + second.length).toBe(1);
    expect(alertStore.alerts.size).toBe(1);
    expect(rule.total_triggers).toBe(1);
    expect(notifier.publish).toHaveBeenCalledTimes(1);
  });

  it('triggers on every match when cooldown enforcement is disabled', async () => {
    await build(createTestConfig({ enforceAlertCooldown: false }));
    const rule = await ruleStore.createAlertRule(baseRule);

    await service.check('device-1', reading(90));
    await service.check('device-1', reading(95));

    expect(rule.total_triggers).toBe(2);
  });

  it('waits for consecutive matches when trigger_count is above one', async () => {
    const rule = await ruleStore.createAlertRule({ ...baseRule, trigger_count: 2, cooldown_minutes: 0 });

    expect(await service.check('device-1', reading(90))).toEqual([]);
    expect(await service.check('device-1', reading(70))).toEqual([]);
    expect(await service.check('device-1', reading(90))).toEqual([]);
    expect(await service.check('device-1', reading(91))).toHaveLength(1);
    expect(rule.total_triggers).toBe(1);
  });

  it('leaves auto_resolve_at empty when auto-resolve is off', async () => {
    await ruleStore.createAlertRule({ ...baseRule, auto_resolve: false });

    const [alert] = await service.check('device-1', reading(90));

    expect(alert.auto_resolve_at).toBeNull();
  });

  it('keeps evaluating other rules when one fails', async () => {
    const failing = await ruleStore.createAlertRule({ ...baseRule, name: 'Failing' });
    await ruleStore.createAlertRule({ ...baseRule, name: 'Working' });
    const createAlert = alertStore.createAlert.bind(alertStore);
    jest.spyOn(alertStore, 'createAlert').mockImplementation(async data => {
      if (data.rule_id === failing.rule_id) {
        throw new Error('insert failed');
      }
      return await createAlert(data);
    });

    const alerts = await service.check('device-1', reading(90));

    expect(alerts.map(alert => alert.rule_name)).toEqual(['Working']);
  });

  it('returns no alerts when rules cannot be loaded', async () => {
    jest.spyOn(ruleStore, 'getEnabledRulesForMetric').mockRejectedValue(new Error('connection refused'));

    expect(await service.check('device-1', reading(90))).toEqual([]);
  });
});
