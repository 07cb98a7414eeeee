import { RawTelemetryValue } from '../types/telemetry-value.type';
import { AlertResolvedEvent, AlertTriggeredEvent } from './telemetry-events.interface';

export interface RealtimeDataEvent {
  subscription_id: string;
  device_id: string;
  metric_name: string;
  value: RawTelemetryValue;
  unit: string | null;
  tags: Record<string, string>;
  timestamp: string;
}

export type AlertStreamEvent =
  | { type: 'alert.triggered'; data: AlertTriggeredEvent }
  | { type: 'alert.resolved'; data: AlertResolvedEvent };

export interface SubscriptionAckEvent {
  subscription_id: string;
  room: string;
}

export interface SubscriptionErrorEvent {
  subscription_id: string;
  error: string;
}

export interface ServerToClientEvents {
  telemetry_data: (data: RealtimeDataEvent) => void;
  alert_event: (data: AlertStreamEvent) => void;
  subscription_ack: (data: SubscriptionAckEvent) => void;
  subscription_error: (data: SubscriptionErrorEvent) => void;
}

export interface ClientToServerEvents {
  subscribe_stream: (subscriptionId: string) => void;
  unsubscribe_stream: (subscriptionId: string) => void;
}

/** In-process event name carrying a `RealtimeDataEvent` to the gateway. */
export const REALTIME_DELIVERY_EVENT = 'realtime.delivery';

export function subscriptionRoom(subscriptionId: string): string {
  return `subscription:${subscriptionId}`;
}
