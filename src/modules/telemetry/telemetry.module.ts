import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { AlertsModule } from '../alerts/alerts.module';
import { RealtimeModule } from '../realtime/realtime.module';
import { TelemetryController } from './telemetry.controller';
import { IngestionService } from './ingestion.service';
import { AggregationService } from './aggregation.service';
import { TelemetryQueryService } from './telemetry-query.service';

@Module({
  imports: [DatabaseModule, AlertsModule, RealtimeModule],
  controllers: [TelemetryController],
  providers: [IngestionService, AggregationService, TelemetryQueryService],
  exports: [IngestionService, AggregationService],
})
export class TelemetryModule {}
