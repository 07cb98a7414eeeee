import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

const processedKey = (eventId: string) => `events:processed:${eventId}`;

export type ChannelHandler = (channel: string, message: string) => void;

@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis;
  private subscriber: Redis | null = null;
  private readonly handlers = new Map<string, ChannelHandler>();

  constructor(private configService: ConfigService) {
    this.client = new Redis({
      host: this.configService.get<string>('REDIS_HOST') || 'localhost',
      port: parseInt(this.configService.get<string>('REDIS_PORT') || '6379', 10),
      password: this.configService.get<string>('REDIS_PASSWORD'),
      maxRetriesPerRequest: 3,
    });

    this.client.on('error', err => {
      this.logger.error(`Redis Client Error: ${err.message}`);
    });

    this.client.on('connect', () => {
      this.logger.log('Redis Client Connected');
    });
  }

  async publish(channel: string, message: string): Promise<number> {
    return await this.client.publish(channel, message);
  }

  /** Subscriber mode needs its own connection, created on first use. */
  async subscribe(channel: string, handler: ChannelHandler): Promise<void> {
    if (!this.subscriber) {
      const subscriber = this.client.duplicate();
      subscriber.on('error', err => {
        this.logger.error(`Redis Subscriber Error: ${err.message}`);
      });
      subscriber.on('message', (receivedChannel: string, message: string) => {
        this.handlers.get(receivedChannel)?.(receivedChannel, message);
      });
      this.subscriber = subscriber;
    }

    this.handlers.set(channel, handler);
    await this.subscriber.subscribe(channel);
  }

  /**
   * Claims an event id for processing. Resolves to false when the id was
   * already claimed within the TTL window.
   */
  async markEventProcessed(eventId: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.client.set(processedKey(eventId), '1', 'EX', ttlSeconds, 'NX');
    return result === 'OK';
  }

  /** Drops a claim so a redelivery of the event is processed again. */
  async releaseEvent(eventId: string): Promise<void> {
    await this.client.del(processedKey(eventId));
  }

  async ping(): Promise<string> {
    return await this.client.ping();
  }

  async onModuleDestroy() {
    if (this.subscriber) {
      await this.subscriber.quit();
    }
    await this.client.quit();
  }
}
