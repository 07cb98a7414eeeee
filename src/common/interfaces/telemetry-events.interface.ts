import { AlertCondition, AlertLevel, DataType, MetricType } from '../types/telemetry.types';

export interface TelemetryDataReceivedEvent {
  device_id: string;
  distinct_metric_count: number;
  ingested_count: number;
  timestamp: string;
}

export interface MetricDefinedEvent {
  metric_id: string;
  name: string;
  data_type: DataType;
  metric_type: MetricType;
  unit: string | null;
  created_by: string;
  timestamp: string;
}

export interface AlertRuleCreatedEvent {
  rule_id: string;
  name: string;
  metric_name: string;
  condition: AlertCondition;
  threshold_value: string;
  level: AlertLevel;
  enabled: boolean;
  created_by: string;
  timestamp: string;
}

export interface AlertTriggeredEvent {
  alert_id: string;
  rule_id: string;
  rule_name: string;
  device_id: string;
  metric_name: string;
  level: AlertLevel;
  current_value: string;
  threshold_value: string;
  timestamp: string;
}

export interface AlertResolvedEvent {
  alert_id: string;
  rule_id: string;
  rule_name: string;
  device_id: string;
  metric_name: string;
  level: AlertLevel;
  resolved_by: string;
  resolution_note: string | null;
  timestamp: string;
}

/** Outbound event names mapped to their payloads; the names are the bus contract. */
export interface TelemetryEventPayloads {
  'telemetry.data.received': TelemetryDataReceivedEvent;
  'metric.defined': MetricDefinedEvent;
  'alert.rule.created': AlertRuleCreatedEvent;
  'alert.triggered': AlertTriggeredEvent;
  'alert.resolved': AlertResolvedEvent;
}

export type TelemetryEventType = keyof TelemetryEventPayloads;

export interface TelemetryEvent<K extends TelemetryEventType = TelemetryEventType> {
  id: string;
  type: K;
  source: string;
  timestamp: string;
  data: TelemetryEventPayloads[K];
}

/** Envelope received from another service on the bus. */
export interface InboundEvent {
  id: string;
  type: string;
  source: string;
  timestamp: string | null;
  data: Record<string, unknown>;
}

export const INBOUND_EVENT_PREFIX = 'inbound.';
