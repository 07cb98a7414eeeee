import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MetricDefinition } from './entities/metric-definition.entity';
import { AlertRule } from './entities/alert-rule.entity';
import { Alert } from './entities/alert.entity';
import { InfluxService } from './services/influx.service';
import { RedisService } from './services/redis.service';
import { PostgresService } from './services/postgres.service';
import {
  ALERT_RULE_STORE,
  ALERT_STORE,
  METRIC_CATALOG,
  TIME_SERIES_STORE,
} from '../common/interfaces/telemetry-stores.interface';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('POSTGRES_HOST') || 'localhost',
        port: parseInt(configService.get<string>('POSTGRES_PORT') || '5432', 10),
        username: configService.get<string>('POSTGRES_USER') || 'postgres',
        password: configService.get<string>('POSTGRES_PASSWORD') || 'password',
        database: configService.get<string>('POSTGRES_DB') || 'telemetry',
        entities: [MetricDefinition, AlertRule, Alert],
        synchronize: configService.get('NODE_ENV') === 'development',
        logging: configService.get('NODE_ENV') === 'development',
        ssl: false,
      }),
      inject: [ConfigService],
    }),
    TypeOrmModule.forFeature([MetricDefinition, AlertRule, Alert]),
  ],
  providers: [
    InfluxService,
    RedisService,
    PostgresService,
    { provide: METRIC_CATALOG, useExisting: PostgresService },
    { provide: ALERT_RULE_STORE, useExisting: PostgresService },
    { provide: ALERT_STORE, useExisting: PostgresService },
    { provide: TIME_SERIES_STORE, useExisting: InfluxService },
    { provide: 'INFLUXDB_SERVICE', useExisting: InfluxService },
    { provide: 'REDIS_SERVICE', useExisting: RedisService },
    { provide: 'POSTGRES_SERVICE', useExisting: PostgresService },
  ],
  exports: [
    TypeOrmModule,
    InfluxService,
    RedisService,
    PostgresService,
    METRIC_CATALOG,
    ALERT_RULE_STORE,
    ALERT_STORE,
    TIME_SERIES_STORE,
    'INFLUXDB_SERVICE',
    'REDIS_SERVICE',
    'POSTGRES_SERVICE',
  ],
})
export class DatabaseModule {}
