import { Module } from '@nestjs/common';
import { RealtimeFanoutService } from './realtime-fanout.service';
import { TelemetryGateway } from './telemetry.gateway';

@Module({
  providers: [RealtimeFanoutService, TelemetryGateway],
  exports: [RealtimeFanoutService],
})
export class RealtimeModule {}
