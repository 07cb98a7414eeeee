import { Inject, Injectable, Logger } from '@nestjs/common';
import { AlertRule } from '../../database/entities/alert-rule.entity';
import { Alert } from '../../database/entities/alert.entity';
import {
  ALERT_RULE_STORE,
  ALERT_STORE,
  AlertRuleStore,
  AlertStore,
} from '../../common/interfaces/telemetry-stores.interface';
import { TELEMETRY_CONFIG, TelemetryConfig } from '../../config/telemetry.config';
import { EventNotifierService } from '../events/event-notifier.service';
import { evaluateCondition } from '../../common/utils/alert-condition.util';
import {
  TelemetryDataPoint,
  formatTelemetryValue,
  fromTelemetryValue,
} from '../../common/types/telemetry-value.type';
import { errorMessage } from '../../common/types/telemetry.types';

@Injectable()
export class AlertEvaluatorService {
  private readonly logger = new Logger(AlertEvaluatorService.name);
  // consecutive matches per `${rule_id}:${device_id}`
  private readonly streaks = new Map<string, number>();

  constructor(
    @Inject(ALERT_RULE_STORE) private readonly ruleStore: AlertRuleStore,
    @Inject(ALERT_STORE) private readonly alertStore: AlertStore,
    private readonly eventNotifier: EventNotifierService,
    @Inject(TELEMETRY_CONFIG) private readonly config: TelemetryConfig,
  ) {}

  /**
   * Evaluates every enabled rule for the point's metric. Never throws; a
   * failing rule is logged and the remaining rules still run.
   */
  async check(deviceId: string, point: TelemetryDataPoint): Promise<Alert[]> {
    let rules: AlertRule[];
    try {
      rules = await this.ruleStore.getEnabledRulesForMetric(point.metric_name);
    } catch (error) {
      this.logger.error(`Failed to load alert rules for ${point.metric_name}: ${errorMessage(error)}`);
      return [];
    }

    const triggered: Alert[] = [];
    for (const rule of rules) {
      try {
        const alert = await this.evaluateRule(rule, deviceId, point);
        if (alert) {
          triggered.push(alert);
        }
      } catch (error) {
        this.logger.error(`Error evaluating alert rule ${rule.rule_id}: ${errorMessage(error)}`);
      }
    }
    return triggered;
  }

  private async evaluateRule(rule: AlertRule, deviceId: string, point: TelemetryDataPoint): Promise<Alert | null> {
    if (!rule.enabled) {
      return null;
    }
    if (rule.device_ids.length > 0 && !rule.device_ids.includes(deviceId)) {
      return null;
    }

    const streakKey = `${rule.rule_id}:${deviceId}`;
    if (!evaluateCondition(rule.condition, rule.threshold_value, point.value)) {
      this.streaks.delete(streakKey);
      return null;
    }

    const streak = (this.streaks.get(streakKey) ?? 0) + 1;
    if (streak < rule.trigger_count) {
      this.streaks.set(streakKey, streak);
      return null;
    }
    this.streaks.delete(streakKey);

    // The store claims the trigger in one statement so concurrent matches
    // cannot both pass the cooldown.
    const now = new Date();
    const cooldownMinutes = this.config.enforceAlertCooldown ? rule.cooldown_minutes : 0;
    if (!(await this.ruleStore.claimRuleTrigger(rule.rule_id, now, cooldownMinutes))) {
      this.logger.debug(`Rule ${rule.rule_id} matched during cooldown, not triggering`);
      return null;
    }

    return await this.triggerAlert(rule, deviceId, point, now);
  }

  private async triggerAlert(rule: AlertRule, deviceId: string, point: TelemetryDataPoint, now: Date): Promise<Alert> {
    const currentValue = formatTelemetryValue(point.value);

    const alert = await this.alertStore.createAlert({
      rule_id: rule.rule_id,
      rule_name: rule.name,
      device_id: deviceId,
      metric_name: point.metric_name,
      level: rule.level,
      status: 'active',
      message: `Alert triggered: ${rule.name}`,
      current_value: currentValue,
      threshold_value: rule.threshold_value,
      triggered_at: now,
      auto_resolve_at: rule.auto_resolve ? new Date(now.getTime() + rule.auto_resolve_timeout * 1000) : null,
      affected_devices_count: 1,
      tags: rule.tags,
      metadata: {
        trigger_value: fromTelemetryValue(point.value),
        data_timestamp: point.timestamp.toISOString(),
      },
    });

    this.eventNotifier.publish('alert.triggered', {
      alert_id: alert.alert_id,
      rule_id: rule.rule_id,
      rule_name: rule.name,
      device_id: deviceId,
      metric_name: point.metric_name,
      level: rule.level,
      current_value: currentValue,
      threshold_value: rule.threshold_value,
      timestamp: now.toISOString(),
    });

    this.logger.log(`Alert ${alert.alert_id} triggered by rule ${rule.name} for device ${deviceId}`);
    return alert;
  }
}
