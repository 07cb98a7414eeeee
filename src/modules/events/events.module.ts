import { Global, Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { EventNotifierService } from './event-notifier.service';
import { EventBusService } from './event-bus.service';

@Global()
@Module({
  imports: [DatabaseModule],
  providers: [EventNotifierService, EventBusService],
  exports: [EventNotifierService],
})
export class EventsModule {}
