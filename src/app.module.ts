import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { TelemetryConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { EventsModule } from './modules/events/events.module';
import { TelemetryModule } from './modules/telemetry/telemetry.module';
import { MetricsModule } from './modules/metrics/metrics.module';
import { AlertsModule } from './modules/alerts/alerts.module';
import { RealtimeModule } from './modules/realtime/realtime.module';
import { HealthModule } from './modules/health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    ScheduleModule.forRoot(),
    EventEmitterModule.forRoot(),
    TelemetryConfigModule,
    DatabaseModule,
    EventsModule,
    TelemetryModule,
    MetricsModule,
    AlertsModule,
    RealtimeModule,
    HealthModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
