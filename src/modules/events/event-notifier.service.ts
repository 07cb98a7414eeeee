import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { v4 as uuidv4 } from 'uuid';
import { RedisService } from '../../database/services/redis.service';
import { TELEMETRY_CONFIG, TelemetryConfig } from '../../config/telemetry.config';
import {
  TelemetryEvent,
  TelemetryEventPayloads,
  TelemetryEventType,
} from '../../common/interfaces/telemetry-events.interface';
import { errorMessage } from '../../common/types/telemetry.types';

/**
 * Best-effort publisher for domain events. Each event is emitted in-process
 * under its type and forwarded to the bus channel `<source>.<type>`; the
 * caller never waits on the bus and never sees a transport error.
 */
@Injectable()
export class EventNotifierService {
  private readonly logger = new Logger(EventNotifierService.name);

  constructor(
    private readonly eventEmitter: EventEmitter2,
    @Inject('REDIS_SERVICE') private readonly redisService: RedisService,
    @Inject(TELEMETRY_CONFIG) private readonly config: TelemetryConfig,
  ) {}

  publish<K extends TelemetryEventType>(type: K, data: TelemetryEventPayloads[K]): TelemetryEvent<K> {
    const event: TelemetryEvent<K> = {
      id: uuidv4(),
      type,
      source: this.config.eventSource,
      timestamp: new Date().toISOString(),
      data,
    };

    try {
      this.eventEmitter.emit(type, event);
    } catch (error) {
      this.logger.error(`Local listener failed for ${type}: ${errorMessage(error)}`);
    }

    const channel = `${this.config.eventSource}.${type}`;
    this.redisService.publish(channel, JSON.stringify(event)).catch((error: unknown) => {
      this.logger.error(`Failed to publish ${type} to ${channel}: ${errorMessage(error)}`);
    });

    return event;
  }
}
