import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { AlertsController } from './alerts.controller';
import { AlertsService } from './alerts.service';
import { AlertEvaluatorService } from './alert-evaluator.service';
import { AlertTasksService } from './alert-tasks.service';
import { DeviceEventsListener } from './device-events.listener';

@Module({
  imports: [DatabaseModule],
  controllers: [AlertsController],
  providers: [AlertsService, AlertEvaluatorService, AlertTasksService, DeviceEventsListener],
  exports: [AlertsService, AlertEvaluatorService],
})
export class AlertsModule {}
