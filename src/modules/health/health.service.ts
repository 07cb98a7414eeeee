import { Injectable, Inject } from '@nestjs/common';
import { InfluxService } from '../../database/services/influx.service';
import { RedisService } from '../../database/services/redis.service';
import { PostgresService } from '../../database/services/postgres.service';
import { errorMessage } from '../../common/types/telemetry.types';

export interface DatabaseStatus {
  status: 'ok' | 'error';
  error: string | null;
}

export interface DatabaseHealth {
  timestamp: string;
  databases: {
    postgres: DatabaseStatus;
    redis: DatabaseStatus;
    influxdb: DatabaseStatus;
  };
  overall_status: 'healthy' | 'degraded';
}

async function checkStore(check: () => Promise<void>): Promise<DatabaseStatus> {
  try {
    await check();
    return { status: 'ok', error: null };
  } catch (error) {
    return { status: 'error', error: errorMessage(error) };
  }
}

@Injectable()
export class HealthService {
  constructor(
    @Inject('INFLUXDB_SERVICE') private influxService: InfluxService,
    @Inject('REDIS_SERVICE') private redisService: RedisService,
    @Inject('POSTGRES_SERVICE') private postgresService: PostgresService,
  ) {}

  checkHealth() {
    const uptime = process.uptime();
    const memoryUsage = process.memoryUsage();

    return {
      status: 'ok',
      service: 'telemetry_service',
      timestamp: new Date().toISOString(),
      uptime: `${Math.floor(uptime / 3600)}h ${Math.floor((uptime % 3600) / 60)}m ${Math.floor(uptime % 60)}s`,
      memory: {
        rss: `${Math.round(memoryUsage.rss / 1024 / 1024)}MB`,
        heapUsed: `${Math.round(memoryUsage.heapUsed / 1024 / 1024)}MB`,
        heapTotal: `${Math.round(memoryUsage.heapTotal / 1024 / 1024)}MB`,
      },
      version: process.env.npm_package_version || '1.0.0',
      environment: process.env.NODE_ENV || 'development',
    };
  }

  async checkDatabaseHealth(): Promise<DatabaseHealth> {
    const [postgres, redis, influxdb] = await Promise.all([
      checkStore(() => this.postgresService.ping()),
      checkStore(async () => {
        const reply = await this.redisService.ping();
        if (reply !== 'PONG') {
          throw new Error('Unexpected ping response');
        }
      }),
      checkStore(() => this.influxService.ping()),
    ]);

    const databases = { postgres, redis, influxdb };
    const allOk = Object.values(databases).every(db => db.status === 'ok');

    return {
      timestamp: new Date().toISOString(),
      databases,
      overall_status: allOk ? 'healthy' : 'degraded',
    };
  }
}
