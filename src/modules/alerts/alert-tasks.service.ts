import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { AlertsService } from './alerts.service';
import { errorMessage } from '../../common/types/telemetry.types';

@Injectable()
export class AlertTasksService {
  private readonly logger = new Logger(AlertTasksService.name);
  private isProcessing = false;

  constructor(private readonly alertsService: AlertsService) {}

  @Cron(CronExpression.EVERY_MINUTE)
  async autoResolveExpiredAlerts() {
    if (this.isProcessing) {
      this.logger.debug('Auto-resolve sweep still running, skipping');
      return;
    }

    this.isProcessing = true;
    try {
      await this.alertsService.autoResolveDue();
    } catch (error) {
      this.logger.error(`Auto-resolve sweep failed: ${errorMessage(error)}`);
    } finally {
      this.isProcessing = false;
    }
  }
}
