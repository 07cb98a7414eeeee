import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, QueryFailedError, Repository, SelectQueryBuilder } from 'typeorm';
import { MetricDefinition } from '../entities/metric-definition.entity';
import { AlertRule } from '../entities/alert-rule.entity';
import { Alert } from '../entities/alert.entity';
import {
  AlertCountFilter,
  AlertListFilter,
  AlertRuleListFilter,
  AlertRuleStore,
  AlertStore,
  AlertUpdate,
  MetricCatalog,
  MetricListFilter,
  NewAlert,
  NewAlertRule,
  NewMetricDefinition,
} from '../../common/interfaces/telemetry-stores.interface';

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof QueryFailedError &&
    'code' in error.driverError &&
    error.driverError.code === '23505'
  );
}

@Injectable()
export class PostgresService implements MetricCatalog, AlertRuleStore, AlertStore {
  private readonly logger = new Logger(PostgresService.name);

  constructor(
    @InjectRepository(MetricDefinition)
    private metricRepository: Repository<MetricDefinition>,
    @InjectRepository(AlertRule)
    private alertRuleRepository: Repository<AlertRule>,
    @InjectRepository(Alert)
    private alertRepository: Repository<Alert>,
  ) {}

  // Metric definition operations
  async createMetricDefinition(
    definitionData: NewMetricDefinition,
  ): Promise<{ definition: MetricDefinition; created: boolean }> {
    const existing = await this.getMetricDefinition(definitionData.name);
    if (existing) {
      return { definition: existing, created: false };
    }

    try {
      const definition = this.metricRepository.create(definitionData);
      return { definition: await this.metricRepository.save(definition), created: true };
    } catch (error) {
      // A concurrent create won the race on the unique name
      if (isUniqueViolation(error)) {
        const winner = await this.getMetricDefinition(definitionData.name);
        if (winner) {
          this.logger.warn(`Metric ${definitionData.name} created concurrently, returning existing definition`);
          return { definition: winner, created: false };
        }
      }
      throw error;
    }
  }

  async getMetricDefinition(name: string): Promise<MetricDefinition | null> {
    return await this.metricRepository.findOne({ where: { name } });
  }

  async getMetricDefinitions(names: string[]): Promise<MetricDefinition[]> {
    if (names.length === 0) {
      return [];
    }
    return await this.metricRepository.find({ where: { name: In(names) } });
  }

  async listMetricDefinitions(filter: MetricListFilter): Promise<MetricDefinition[]> {
    return await this.metricRepository.find({
      where: {
        ...(filter.data_type ? { data_type: filter.data_type } : {}),
        ...(filter.metric_type ? { metric_type: filter.metric_type } : {}),
      },
      order: { name: 'ASC' },
      take: filter.limit,
      skip: filter.offset,
    });
  }

  async deleteMetricDefinition(name: string): Promise<boolean> {
    const result = await this.metricRepository.delete({ name });
    return (result.affected || 0) > 0;
  }

  // Alert rule operations
  async createAlertRule(ruleData: NewAlertRule): Promise<AlertRule> {
    const rule = this.alertRuleRepository.create({ ...ruleData, total_triggers: 0, last_triggered: null });
    return await this.alertRuleRepository.save(rule);
  }

  async getAlertRule(ruleId: string): Promise<AlertRule | null> {
    return await this.alertRuleRepository.findOne({ where: { rule_id: ruleId } });
  }

  async listAlertRules(filter: AlertRuleListFilter): Promise<AlertRule[]> {
    return await this.alertRuleRepository.find({
      where: {
        ...(filter.enabled_only ? { enabled: true } : {}),
        ...(filter.metric_name ? { metric_name: filter.metric_name } : {}),
      },
      order: { created_at: 'DESC' },
      take: filter.limit,
      skip: filter.offset,
    });
  }

  async getEnabledRulesForMetric(metricName: string): Promise<AlertRule[]> {
    return await this.alertRuleRepository.find({
      where: { metric_name: metricName, enabled: true },
    });
  }

  async setAlertRuleEnabled(ruleId: string, enabled: boolean): Promise<AlertRule | null> {
    await this.alertRuleRepository.update({ rule_id: ruleId }, { enabled });
    return await this.getAlertRule(ruleId);
  }

  async claimRuleTrigger(ruleId: string, triggeredAt: Date, cooldownMinutes: number): Promise<boolean> {
    const query = this.alertRuleRepository
      .createQueryBuilder()
      .update(AlertRule)
      .set({ total_triggers: () => 'total_triggers + 1', last_triggered: triggeredAt })
      .where('rule_id = :ruleId', { ruleId });

    if (cooldownMinutes > 0) {
      const cutoff = new Date(triggeredAt.getTime() - cooldownMinutes * 60 * 1000);
      query.andWhere('(last_triggered IS NULL OR last_triggered <= :cutoff)', { cutoff });
    }

    const result = await query.execute();
    return (result.affected || 0) > 0;
  }

  async disableDeviceAlertRules(deviceId: string): Promise<number> {
    const result = await this.alertRuleRepository
      .createQueryBuilder()
      .update(AlertRule)
      .set({ enabled: false })
      .where(':deviceId = ANY(device_ids)', { deviceId })
      .andWhere('enabled = true')
      .execute();

    return result.affected || 0;
  }

  // Alert operations
  async createAlert(alertData: NewAlert): Promise<Alert> {
    const alert = this.alertRepository.create(alertData);
    return await this.alertRepository.save(alert);
  }

  async getAlert(alertId: string): Promise<Alert | null> {
    return await this.alertRepository.findOne({ where: { alert_id: alertId } });
  }

  async updateAlert(alertId: string, changes: AlertUpdate): Promise<Alert | null> {
    await this.alertRepository.update({ alert_id: alertId }, changes);
    return await this.getAlert(alertId);
  }

  async listAlerts(filter: AlertListFilter): Promise<{ alerts: Alert[]; total: number }> {
    const [alerts, total] = await this.filteredAlerts(filter)
      .orderBy('alert.triggered_at', 'DESC')
      .take(filter.limit)
      .skip(filter.offset)
      .getManyAndCount();

    return { alerts, total };
  }

  async countAlerts(filter: AlertCountFilter): Promise<number> {
    return await this.filteredAlerts(filter).getCount();
  }

  async findDueAutoResolve(now: Date, limit: number): Promise<Alert[]> {
    return await this.alertRepository
      .createQueryBuilder('alert')
      .where('alert.status = :status', { status: 'active' })
      .andWhere('alert.auto_resolve_at IS NOT NULL')
      .andWhere('alert.auto_resolve_at <= :now', { now })
      .orderBy('alert.auto_resolve_at', 'ASC')
      .take(limit)
      .getMany();
  }

  private filteredAlerts(filter: AlertCountFilter): SelectQueryBuilder<Alert> {
    const query = this.alertRepository.createQueryBuilder('alert');

    if (filter.device_id) {
      query.andWhere('alert.device_id = :deviceId', { deviceId: filter.device_id });
    }
    if (filter.status) {
      query.andWhere('alert.status = :status', { status: filter.status });
    }
    if (filter.level) {
      query.andWhere('alert.level = :level', { level: filter.level });
    }
    if (filter.start_time) {
      query.andWhere('alert.triggered_at >= :startTime', { startTime: filter.start_time });
    }
    if (filter.end_time) {
      query.andWhere('alert.triggered_at <= :endTime', { endTime: filter.end_time });
    }

    return query;
  }

  async ping(): Promise<void> {
    await this.metricRepository.query('SELECT 1');
  }
}
