import { Inject, Injectable, Logger } from '@nestjs/common';
import { AlertRule } from '../../database/entities/alert-rule.entity';
import { Alert } from '../../database/entities/alert.entity';
import {
  ALERT_RULE_STORE,
  ALERT_STORE,
  AlertListFilter,
  AlertRuleListFilter,
  AlertRuleStore,
  AlertStore,
} from '../../common/interfaces/telemetry-stores.interface';
import { TELEMETRY_CONFIG, TelemetryConfig } from '../../config/telemetry.config';
import { EventNotifierService } from '../events/event-notifier.service';
import { CreateAlertRuleDto } from '../../common/dto/alert-rule.dto';
import { AlertStatus, OperationResult, errorMessage } from '../../common/types/telemetry.types';

export type AlertTransition =
  | { outcome: 'updated'; alert: Alert }
  | { outcome: 'not_found' }
  | { outcome: 'invalid_transition'; status: AlertStatus };

export interface AlertListResult {
  alerts: Alert[];
  count: number;
  total: number;
  active_count: number;
  critical_count: number;
}

const ACKNOWLEDGEABLE: AlertStatus[] = ['active'];
const RESOLVABLE: AlertStatus[] = ['active', 'acknowledged', 'suppressed'];

@Injectable()
export class AlertsService {
  private readonly logger = new Logger(AlertsService.name);

  constructor(
    @Inject(ALERT_RULE_STORE) private readonly ruleStore: AlertRuleStore,
    @Inject(ALERT_STORE) private readonly alertStore: AlertStore,
    private readonly eventNotifier: EventNotifierService,
    @Inject(TELEMETRY_CONFIG) private readonly config: TelemetryConfig,
  ) {}

  // Alert rule operations
  async createAlertRule(dto: CreateAlertRuleDto, createdBy: string): Promise<OperationResult<AlertRule>> {
    try {
      const rule = await this.ruleStore.createAlertRule({
        name: dto.name,
        description: dto.description ?? null,
        metric_name: dto.metric_name,
        condition: dto.condition,
        threshold_value: dto.threshold_value,
        evaluation_window: dto.evaluation_window ?? 300,
        trigger_count: dto.trigger_count ?? 1,
        level: dto.level ?? 'warning',
        device_ids: dto.device_ids ?? [],
        device_groups: dto.device_groups ?? [],
        device_filters: dto.device_filters ?? {},
        notification_channels: dto.notification_channels ?? [],
        cooldown_minutes: dto.cooldown_minutes ?? 15,
        auto_resolve: dto.auto_resolve ?? true,
        auto_resolve_timeout: dto.auto_resolve_timeout ?? 3600,
        enabled: dto.enabled ?? true,
        tags: dto.tags ?? [],
        created_by: createdBy,
      });

      this.eventNotifier.publish('alert.rule.created', {
        rule_id: rule.rule_id,
        name: rule.name,
        metric_name: rule.metric_name,
        condition: rule.condition,
        threshold_value: rule.threshold_value,
        level: rule.level,
        enabled: rule.enabled,
        created_by: createdBy,
        timestamp: new Date().toISOString(),
      });

      return { success: true, data: rule };
    } catch (error) {
      this.logger.error(`Failed to create alert rule ${dto.name}: ${errorMessage(error)}`);
      return { success: false, error: `Failed to create alert rule: ${errorMessage(error)}` };
    }
  }

  async getAlertRule(ruleId: string): Promise<AlertRule | null> {
    return await this.ruleStore.getAlertRule(ruleId);
  }

  async listAlertRules(filter: AlertRuleListFilter): Promise<AlertRule[]> {
    return await this.ruleStore.listAlertRules(filter);
  }

  /** `data` is null when the rule does not exist. */
  async setAlertRuleEnabled(ruleId: string, enabled: boolean): Promise<OperationResult<AlertRule | null>> {
    try {
      return { success: true, data: await this.ruleStore.setAlertRuleEnabled(ruleId, enabled) };
    } catch (error) {
      this.logger.error(`Failed to update alert rule ${ruleId}: ${errorMessage(error)}`);
      return { success: false, error: `Failed to update alert rule: ${errorMessage(error)}` };
    }
  }

  async disableDeviceAlertRules(deviceId: string): Promise<OperationResult<number>> {
    try {
      const disabled = await this.ruleStore.disableDeviceAlertRules(deviceId);
      this.logger.log(`Disabled ${disabled} alert rules for device ${deviceId}`);
      return { success: true, data: disabled };
    } catch (error) {
      this.logger.error(`Failed to disable alert rules for device ${deviceId}: ${errorMessage(error)}`);
      return { success: false, error: errorMessage(error) };
    }
  }

  // Alert operations
  async listAlerts(filter: AlertListFilter): Promise<AlertListResult> {
    const { limit, offset, ...criteria } = filter;
    const { alerts, total } = await this.alertStore.listAlerts(filter);

    const activeCount =
      criteria.status && criteria.status !== 'active'
        ? 0
        : await this.alertStore.countAlerts({ ...criteria, status: 'active' });
    const criticalCount =
      criteria.level && criteria.level !== 'critical'
        ? 0
        : await this.alertStore.countAlerts({ ...criteria, level: 'critical' });

    this.logger.debug(`Listed ${alerts.length} alerts (limit ${limit}, offset ${offset})`);

    return {
      alerts,
      count: alerts.length,
      total,
      active_count: activeCount,
      critical_count: criticalCount,
    };
  }

  async acknowledgeAlert(alertId: string, acknowledgedBy: string): Promise<OperationResult<AlertTransition>> {
    try {
      const alert = await this.alertStore.getAlert(alertId);
      if (!alert) {
        return { success: true, data: { outcome: 'not_found' } };
      }
      if (!ACKNOWLEDGEABLE.includes(alert.status)) {
        return { success: true, data: { outcome: 'invalid_transition', status: alert.status } };
      }

      const updated = await this.alertStore.updateAlert(alertId, {
        status: 'acknowledged',
        acknowledged_at: new Date(),
        acknowledged_by: acknowledgedBy,
      });
      return { success: true, data: updated ? { outcome: 'updated', alert: updated } : { outcome: 'not_found' } };
    } catch (error) {
      this.logger.error(`Failed to acknowledge alert ${alertId}: ${errorMessage(error)}`);
      return { success: false, error: `Failed to acknowledge alert: ${errorMessage(error)}` };
    }
  }

  async resolveAlert(
    alertId: string,
    resolvedBy: string,
    resolutionNote?: string,
  ): Promise<OperationResult<AlertTransition>> {
    try {
      const alert = await this.alertStore.getAlert(alertId);
      if (!alert) {
        return { success: true, data: { outcome: 'not_found' } };
      }
      if (!RESOLVABLE.includes(alert.status)) {
        return { success: true, data: { outcome: 'invalid_transition', status: alert.status } };
      }

      const resolvedAt = new Date();
      const updated = await this.alertStore.updateAlert(alertId, {
        status: 'resolved',
        resolved_at: resolvedAt,
        resolved_by: resolvedBy,
        resolution_note: resolutionNote ?? null,
      });
      if (!updated) {
        return { success: true, data: { outcome: 'not_found' } };
      }

      this.eventNotifier.publish('alert.resolved', {
        alert_id: updated.alert_id,
        rule_id: updated.rule_id,
        rule_name: updated.rule_name,
        device_id: updated.device_id,
        metric_name: updated.metric_name,
        level: updated.level,
        resolved_by: resolvedBy,
        resolution_note: resolutionNote ?? null,
        timestamp: resolvedAt.toISOString(),
      });

      return { success: true, data: { outcome: 'updated', alert: updated } };
    } catch (error) {
      this.logger.error(`Failed to resolve alert ${alertId}: ${errorMessage(error)}`);
      return { success: false, error: `Failed to resolve alert: ${errorMessage(error)}` };
    }
  }

  /** Resolves active alerts whose auto-resolve time has passed; returns how many were resolved. */
  async autoResolveDue(now: Date = new Date()): Promise<number> {
    const due = await this.alertStore.findDueAutoResolve(now, this.config.autoResolveBatchSize);
    let resolved = 0;

    for (const alert of due) {
      const result = await this.resolveAlert(alert.alert_id, 'system', 'Auto-resolved after timeout');
      if (result.success && result.data.outcome === 'updated') {
        resolved++;
      }
    }

    if (resolved > 0) {
      this.logger.log(`Auto-resolved ${resolved} alerts`);
    }
    return resolved;
  }
}
