import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { AlertsService } from './alerts.service';
import { InboundEvent } from '../../common/interfaces/telemetry-events.interface';

@Injectable()
export class DeviceEventsListener {
  private readonly logger = new Logger(DeviceEventsListener.name);

  constructor(private readonly alertsService: AlertsService) {}

  // Errors reach the event bus, which releases the event for redelivery
  @OnEvent('inbound.device.deleted', { suppressErrors: false })
  async handleDeviceDeleted(event: InboundEvent) {
    const deviceId = event.data.device_id;
    if (typeof deviceId !== 'string' || deviceId === '') {
      this.logger.warn(`device.deleted event ${event.id} has no device_id`);
      return;
    }

    const result = await this.alertsService.disableDeviceAlertRules(deviceId);
    if (!result.success) {
      throw new Error(`Could not disable alert rules for device ${deviceId}: ${result.error}`);
    }
    this.logger.log(`Device ${deviceId} deleted, disabled ${result.data} alert rules`);
  }
}
