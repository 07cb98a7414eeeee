import { MetricDefinition } from '../../database/entities/metric-definition.entity';
import { AlertRule } from '../../database/entities/alert-rule.entity';
import { Alert } from '../../database/entities/alert.entity';
import { AlertLevel, AlertStatus, DataType, MetricType } from '../types/telemetry.types';
import { StoredDataPoint, TelemetryDataPoint } from '../types/telemetry-value.type';

export const METRIC_CATALOG = 'METRIC_CATALOG';
export const ALERT_RULE_STORE = 'ALERT_RULE_STORE';
export const ALERT_STORE = 'ALERT_STORE';
export const TIME_SERIES_STORE = 'TIME_SERIES_STORE';

export type NewMetricDefinition = Omit<MetricDefinition, 'metric_id' | 'created_at' | 'updated_at'>;

export type NewAlertRule = Omit<
  AlertRule,
  'rule_id' | 'total_triggers' | 'last_triggered' | 'created_at' | 'updated_at'
>;

export type NewAlert = Omit<
  Alert,
  | 'alert_id'
  | 'acknowledged_at'
  | 'acknowledged_by'
  | 'resolved_at'
  | 'resolved_by'
  | 'resolution_note'
  | 'created_at'
  | 'updated_at'
>;

export type AlertUpdate = Partial<
  Pick<
    Alert,
    'status' | 'acknowledged_at' | 'acknowledged_by' | 'resolved_at' | 'resolved_by' | 'resolution_note'
  >
>;

export interface MetricListFilter {
  data_type?: DataType;
  metric_type?: MetricType;
  limit: number;
  offset: number;
}

export interface AlertRuleListFilter {
  enabled_only?: boolean;
  metric_name?: string;
  limit: number;
  offset: number;
}

export interface AlertCountFilter {
  device_id?: string;
  status?: AlertStatus;
  level?: AlertLevel;
  start_time?: Date;
  end_time?: Date;
}

export interface AlertListFilter extends AlertCountFilter {
  limit: number;
  offset: number;
}

export interface MetricCatalog {
  /** Returns the existing definition with `created: false` when the name is taken. */
  createMetricDefinition(definition: NewMetricDefinition): Promise<{ definition: MetricDefinition; created: boolean }>;
  getMetricDefinition(name: string): Promise<MetricDefinition | null>;
  getMetricDefinitions(names: string[]): Promise<MetricDefinition[]>;
  listMetricDefinitions(filter: MetricListFilter): Promise<MetricDefinition[]>;
  deleteMetricDefinition(name: string): Promise<boolean>;
}

export interface AlertRuleStore {
  createAlertRule(rule: NewAlertRule): Promise<AlertRule>;
  getAlertRule(ruleId: string): Promise<AlertRule | null>;
  listAlertRules(filter: AlertRuleListFilter): Promise<AlertRule[]>;
  getEnabledRulesForMetric(metricName: string): Promise<AlertRule[]>;
  setAlertRuleEnabled(ruleId: string, enabled: boolean): Promise<AlertRule | null>;
  /**
   * Atomically increments `total_triggers` and stamps `last_triggered`, unless
   * the rule last triggered less than `cooldownMinutes` before `triggeredAt`.
   * Resolves to false when the cooldown held the trigger back.
   */
  claimRuleTrigger(ruleId: string, triggeredAt: Date, cooldownMinutes: number): Promise<boolean>;
  /** Disables every enabled rule scoped to the device; resolves to the number changed. */
  disableDeviceAlertRules(deviceId: string): Promise<number>;
}

export interface AlertStore {
  createAlert(alert: NewAlert): Promise<Alert>;
  getAlert(alertId: string): Promise<Alert | null>;
  updateAlert(alertId: string, changes: AlertUpdate): Promise<Alert | null>;
  listAlerts(filter: AlertListFilter): Promise<{ alerts: Alert[]; total: number }>;
  countAlerts(filter: AlertCountFilter): Promise<number>;
  findDueAutoResolve(now: Date, limit: number): Promise<Alert[]>;
}

export interface TimeSeriesQuery {
  device_ids?: string[];
  metric_names?: string[];
  start_time: Date;
  end_time: Date;
  limit: number;
}

/** Per (device, metric) series counters used by the stats endpoints. */
export interface SeriesSummary {
  device_id: string;
  metric_name: string;
  total_points: number;
  recent_points: number;
  last_timestamp: Date | null;
}

export interface TimeSeriesStore {
  /** Upserts on (timestamp, device_id, metric_name). */
  writePoint(deviceId: string, point: TelemetryDataPoint): Promise<void>;
  /** Points in `[start_time, end_time]`, ascending by time. */
  queryPoints(query: TimeSeriesQuery): Promise<StoredDataPoint[]>;
  getLatestPoint(deviceId: string, metricName: string, since: Date): Promise<StoredDataPoint | null>;
  getDeviceMetricNames(deviceId: string): Promise<string[]>;
  /** `recent_points` counts points at or after `since`. */
  getSeriesSummaries(since: Date, deviceId?: string): Promise<SeriesSummary[]>;
}
