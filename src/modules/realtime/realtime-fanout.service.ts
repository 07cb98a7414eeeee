import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { v4 as uuidv4 } from 'uuid';
import { TELEMETRY_CONFIG, TelemetryConfig } from '../../config/telemetry.config';
import { FilterExpression, evaluateCondition, parseFilterExpression } from '../../common/utils/alert-condition.util';
import { TelemetryDataPoint, fromTelemetryValue } from '../../common/types/telemetry-value.type';
import { OperationResult, errorMessage } from '../../common/types/telemetry.types';
import { REALTIME_DELIVERY_EVENT, RealtimeDataEvent } from '../../common/interfaces/websocket-events.interface';

export interface SubscriptionFilter {
  device_ids?: string[];
  metric_names?: string[];
  tags?: Record<string, string>;
  filter_condition?: string | null;
  max_frequency?: number;
}

export interface RealtimeSubscription {
  subscription_id: string;
  device_ids: string[];
  metric_names: string[];
  tags: Record<string, string>;
  filter_condition: string | null;
  /** Minimum milliseconds between two deliveries. */
  max_frequency: number;
  created_at: Date;
  last_sent: Date | null;
}

interface RegisteredSubscription {
  subscription: RealtimeSubscription;
  expression: FilterExpression | null;
}

@Injectable()
export class RealtimeFanoutService {
  private readonly logger = new Logger(RealtimeFanoutService.name);
  private readonly subscriptions = new Map<string, RegisteredSubscription>();

  constructor(
    private readonly eventEmitter: EventEmitter2,
    @Inject(TELEMETRY_CONFIG) private readonly config: TelemetryConfig,
  ) {}

  subscribe(filter: SubscriptionFilter): OperationResult<RealtimeSubscription> {
    let expression: FilterExpression | null = null;
    if (filter.filter_condition) {
      expression = parseFilterExpression(filter.filter_condition);
      if (!expression) {
        return { success: false, error: `Invalid filter condition: ${filter.filter_condition}` };
      }
    }

    const subscription: RealtimeSubscription = {
      subscription_id: uuidv4(),
      device_ids: filter.device_ids ?? [],
      metric_names: filter.metric_names ?? [],
      tags: filter.tags ?? {},
      filter_condition: filter.filter_condition || null,
      max_frequency: filter.max_frequency ?? this.config.defaultRealtimeMaxFrequencyMs,
      created_at: new Date(),
      last_sent: null,
    };

    this.subscriptions.set(subscription.subscription_id, { subscription, expression });
    this.logger.log(`Created real-time subscription ${subscription.subscription_id}`);

    return { success: true, data: subscription };
  }

  unsubscribe(subscriptionId: string): boolean {
    const removed = this.subscriptions.delete(subscriptionId);
    if (removed) {
      this.logger.log(`Removed real-time subscription ${subscriptionId}`);
    }
    return removed;
  }

  getSubscription(subscriptionId: string): RealtimeSubscription | null {
    return this.subscriptions.get(subscriptionId)?.subscription ?? null;
  }

  count(): number {
    return this.subscriptions.size;
  }

  /** Delivers the point to every matching subscription outside its rate window; returns the delivery count. */
  notify(deviceId: string, point: TelemetryDataPoint): number {
    const now = new Date();
    let delivered = 0;

    for (const { subscription, expression } of this.subscriptions.values()) {
      if (!this.matches(subscription, expression, deviceId, point)) {
        continue;
      }
      if (subscription.last_sent && now.getTime() - subscription.last_sent.getTime() < subscription.max_frequency) {
        continue;
      }

      const event: RealtimeDataEvent = {
        subscription_id: subscription.subscription_id,
        device_id: deviceId,
        metric_name: point.metric_name,
        value: fromTelemetryValue(point.value),
        unit: point.unit ?? null,
        tags: point.tags,
        timestamp: point.timestamp.toISOString(),
      };

      try {
        this.eventEmitter.emit(REALTIME_DELIVERY_EVENT, event);
        subscription.last_sent = now;
        delivered++;
      } catch (error) {
        this.logger.error(`Delivery to ${subscription.subscription_id} failed: ${errorMessage(error)}`);
      }
    }

    return delivered;
  }

  private matches(
    subscription: RealtimeSubscription,
    expression: FilterExpression | null,
    deviceId: string,
    point: TelemetryDataPoint,
  ): boolean {
    if (subscription.device_ids.length > 0 && !subscription.device_ids.includes(deviceId)) {
      return false;
    }
    if (subscription.metric_names.length > 0 && !subscription.metric_names.includes(point.metric_name)) {
      return false;
    }
    for (const [key, value] of Object.entries(subscription.tags)) {
      if (point.tags[key] !== value) {
        return false;
      }
    }
    return !expression || evaluateCondition(expression.condition, expression.threshold, point.value);
  }
}
