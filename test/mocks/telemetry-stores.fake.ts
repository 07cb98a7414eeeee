import { v4 as uuidv4 } from 'uuid';
import { MetricDefinition } from '../../src/database/entities/metric-definition.entity';
import { AlertRule } from '../../src/database/entities/alert-rule.entity';
import { Alert } from '../../src/database/entities/alert.entity';
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
  SeriesSummary,
  TimeSeriesQuery,
  TimeSeriesStore,
} from '../../src/common/interfaces/telemetry-stores.interface';
import { StoredDataPoint, TelemetryDataPoint } from '../../src/common/types/telemetry-value.type';

/**
 * In-memory stores behind the same interfaces the Postgres and InfluxDB
 * services implement. Keeps unit tests free of database connections.
 */
export class FakeMetricCatalog implements MetricCatalog {
  readonly definitions = new Map<string, MetricDefinition>();

  async createMetricDefinition(data: NewMetricDefinition): Promise<{ definition: MetricDefinition; created: boolean }> {
    const existing = this.definitions.get(data.name);
    if (existing) {
      return { definition: existing, created: false };
    }
    const now = new Date();
    const definition = Object.assign(new MetricDefinition(), data, {
      metric_id: uuidv4(),
      created_at: now,
      updated_at: now,
    });
    this.definitions.set(data.name, definition);
    return { definition, created: true };
  }

  async getMetricDefinition(name: string) {
    return this.definitions.get(name) ?? null;
  }

  async getMetricDefinitions(names: string[]) {
    return names.flatMap(name => {
      const definition = this.definitions.get(name);
      return definition ? [definition] : [];
    });
  }

  async listMetricDefinitions(filter: MetricListFilter) {
    return [...this.definitions.values()]
      .filter(d => !filter.data_type || d.data_type === filter.data_type)
      .filter(d => !filter.metric_type || d.metric_type === filter.metric_type)
      .sort((a, b) => a.name.localeCompare(b.name))
      .slice(filter.offset, filter.offset + filter.limit);
  }

  async deleteMetricDefinition(name: string) {
    return this.definitions.delete(name);
  }
}

export class FakeAlertRuleStore implements AlertRuleStore {
  readonly rules = new Map<string, AlertRule>();

  async createAlertRule(data: NewAlertRule): Promise<AlertRule> {
    const now = new Date();
    const rule = Object.assign(new AlertRule(), data, {
      rule_id: uuidv4(),
      total_triggers: 0,
      last_triggered: null,
      created_at: now,
      updated_at: now,
    });
    this.rules.set(rule.rule_id, rule);
    return rule;
  }

  async getAlertRule(ruleId: string) {
    return this.rules.get(ruleId) ?? null;
  }

  async listAlertRules(filter: AlertRuleListFilter) {
    return [...this.rules.values()]
      .filter(r => !filter.enabled_only || r.enabled)
      .filter(r => !filter.metric_name || r.metric_name === filter.metric_name)
      .slice(filter.offset, filter.offset + filter.limit);
  }

  async getEnabledRulesForMetric(metricName: string) {
    return [...this.rules.values()].filter(r => r.enabled && r.metric_name === metricName);
  }

  async setAlertRuleEnabled(ruleId: string, enabled: boolean) {
    const rule = this.rules.get(ruleId);
    if (!rule) {
      return null;
    }
    rule.enabled = enabled;
    return rule;
  }

  async claimRuleTrigger(ruleId: string, triggeredAt: Date, cooldownMinutes: number) {
    const rule = this.rules.get(ruleId);
    if (!rule) {
      return false;
    }
    const cutoff = triggeredAt.getTime() - cooldownMinutes * 60 * 1000;
    if (cooldownMinutes > 0 && rule.last_triggered && rule.last_triggered.getTime() > cutoff) {
      return false;
    }
    rule.total_triggers += 1;
    rule.last_triggered = triggeredAt;
    return true;
  }

  async disableDeviceAlertRules(deviceId: string) {
    let disabled = 0;
    for (const rule of this.rules.values()) {
      if (rule.enabled && rule.device_ids.includes(deviceId)) {
        rule.enabled = false;
        disabled++;
      }
    }
    return disabled;
  }
}

export class FakeAlertStore implements AlertStore {
  readonly alerts = new Map<string, Alert>();

  async createAlert(data: NewAlert): Promise<Alert> {
    const now = new Date();
    const alert = Object.assign(new Alert(), data, {
      alert_id: uuidv4(),
      acknowledged_at: null,
      acknowledged_by: null,
      resolved_at: null,
      resolved_by: null,
      resolution_note: null,
      created_at: now,
      updated_at: now,
    });
    this.alerts.set(alert.alert_id, alert);
    return alert;
  }

  async getAlert(alertId: string) {
    return this.alerts.get(alertId) ?? null;
  }

  async updateAlert(alertId: string, changes: AlertUpdate) {
    const alert = this.alerts.get(alertId);
    if (!alert) {
      return null;
    }
    Object.assign(alert, changes, { updated_at: new Date() });
    return alert;
  }

  async listAlerts(filter: AlertListFilter) {
    const matching = this.matching(filter).sort((a, b) => b.triggered_at.getTime() - a.triggered_at.getTime());
    return { alerts: matching.slice(filter.offset, filter.offset + filter.limit), total: matching.length };
  }

  async countAlerts(filter: AlertCountFilter) {
    return this.matching(filter).length;
  }

  async findDueAutoResolve(now: Date, limit: number) {
    return [...this.alerts.values()]
      .filter(a => a.status === 'active' && a.auto_resolve_at !== null && a.auto_resolve_at <= now)
      .slice(0, limit);
  }

  private matching(filter: AlertCountFilter): Alert[] {
    return [...this.alerts.values()].filter(
      a =>
        (!filter.device_id || a.device_id === filter.device_id) &&
        (!filter.status || a.status === filter.status) &&
        (!filter.level || a.level === filter.level) &&
        (!filter.start_time || a.triggered_at >= filter.start_time) &&
        (!filter.end_time || a.triggered_at <= filter.end_time),
    );
  }
}

export class FakeTimeSeriesStore implements TimeSeriesStore {
  // keyed by `${timestamp}|${device}|${metric}` so rewrites replace
  readonly points = new Map<string, StoredDataPoint>();

  async writePoint(deviceId: string, point: TelemetryDataPoint) {
    const key = `${point.timestamp.getTime()}|${deviceId}|${point.metric_name}`;
    this.points.set(key, { ...point, device_id: deviceId });
  }

  async queryPoints(query: TimeSeriesQuery) {
    return this.all()
      .filter(
        p =>
          p.timestamp >= query.start_time &&
          p.timestamp <= query.end_time &&
          (!query.device_ids || query.device_ids.length === 0 || query.device_ids.includes(p.device_id)) &&
          (!query.metric_names || query.metric_names.length === 0 || query.metric_names.includes(p.metric_name)),
      )
      .slice(0, query.limit);
  }

  async getLatestPoint(deviceId: string, metricName: string, since: Date) {
    const matching = this.all().filter(
      p => p.device_id === deviceId && p.metric_name === metricName && p.timestamp >= since,
    );
    return matching[matching.length - 1] ?? null;
  }

  async getDeviceMetricNames(deviceId: string) {
    return [...new Set(this.all().filter(p => p.device_id === deviceId).map(p => p.metric_name))].sort();
  }

  async getSeriesSummaries(since: Date, deviceId?: string) {
    const summaries = new Map<string, SeriesSummary>();
    for (const point of this.all()) {
      if (deviceId && point.device_id !== deviceId) {
        continue;
      }
      const key = `${point.device_id}|${point.metric_name}`;
      const summary: SeriesSummary = summaries.get(key) ?? {
        device_id: point.device_id,
        metric_name: point.metric_name,
        total_points: 0,
        recent_points: 0,
        last_timestamp: null,
      };
      summary.total_points++;
      if (point.timestamp >= since) {
        summary.recent_points++;
      }
      if (!summary.last_timestamp || point.timestamp > summary.last_timestamp) {
        summary.last_timestamp = point.timestamp;
      }
      summaries.set(key, summary);
    }
    return [...summaries.values()];
  }

  private all(): StoredDataPoint[] {
    return [...this.points.values()].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }
}
