import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { RedisService } from '../../database/services/redis.service';
import { TELEMETRY_CONFIG, TelemetryConfig } from '../../config/telemetry.config';
import { INBOUND_EVENT_PREFIX, InboundEvent } from '../../common/interfaces/telemetry-events.interface';
import { errorMessage } from '../../common/types/telemetry.types';

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

/**
 * Parses a bus message into an envelope. Accepts `event_type` as an alias of
 * `type`; without either the type is taken from the channel suffix
 * (`device_service.device.deleted` -> `device.deleted`).
 */
export function parseInboundEvent(channel: string, message: string): InboundEvent | null {
  let raw: unknown;
  try {
    raw = JSON.parse(message);
  } catch {
    return null;
  }
  if (!isRecord(raw)) {
    return null;
  }
  const { id, data } = raw;
  if (typeof id !== 'string' || id === '' || !isRecord(data)) {
    return null;
  }

  const separator = channel.indexOf('.');
  const channelType = separator >= 0 ? channel.slice(separator + 1) : channel;
  const type =
    typeof raw.type === 'string' ? raw.type : typeof raw.event_type === 'string' ? raw.event_type : channelType;

  return {
    id,
    type,
    source: typeof raw.source === 'string' ? raw.source : channel.slice(0, Math.max(separator, 0)),
    timestamp: typeof raw.timestamp === 'string' ? raw.timestamp : null,
    data,
  };
}

@Injectable()
export class EventBusService implements OnModuleInit {
  private readonly logger = new Logger(EventBusService.name);

  constructor(
    private readonly eventEmitter: EventEmitter2,
    @Inject('REDIS_SERVICE') private readonly redisService: RedisService,
    @Inject(TELEMETRY_CONFIG) private readonly config: TelemetryConfig,
  ) {}

  async onModuleInit() {
    for (const channel of this.config.inboundEventChannels) {
      try {
        await this.redisService.subscribe(channel, (receivedChannel, message) => {
          void this.handleMessage(receivedChannel, message);
        });
        this.logger.log(`Subscribed to ${channel}`);
      } catch (error) {
        this.logger.error(`Failed to subscribe to ${channel}: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Resolves to true when local listeners handled the message. A claim is
   * released again when a listener fails, so the event can be redelivered.
   */
  async handleMessage(channel: string, message: string): Promise<boolean> {
    const event = parseInboundEvent(channel, message);
    if (!event) {
      this.logger.warn(`Dropping malformed event on ${channel}`);
      return false;
    }

    let claimed = false;
    try {
      claimed = await this.redisService.markEventProcessed(event.id, this.config.eventDedupTtlSeconds);
      if (!claimed) {
        this.logger.debug(`Skipping duplicate event ${event.id}`);
        return false;
      }
    } catch (error) {
      this.logger.warn(`Dedup check failed for ${event.id}, processing anyway: ${errorMessage(error)}`);
    }

    try {
      await this.eventEmitter.emitAsync(`${INBOUND_EVENT_PREFIX}${event.type}`, event);
      return true;
    } catch (error) {
      this.logger.error(`Handler failed for ${event.type} (${event.id}): ${errorMessage(error)}`);
      if (claimed) {
        await this.releaseClaim(event.id);
      }
      return false;
    }
  }

  private async releaseClaim(eventId: string) {
    try {
      await this.redisService.releaseEvent(eventId);
    } catch (error) {
      this.logger.error(`Failed to release claim on ${eventId}: ${errorMessage(error)}`);
    }
  }
}
