import {
  WebSocketGateway as NestWebSocketGateway,
  WebSocketServer,
  SubscribeMessage,
  OnGatewayConnection,
  OnGatewayDisconnect,
  MessageBody,
  ConnectedSocket,
} from '@nestjs/websockets';
import { OnEvent } from '@nestjs/event-emitter';
import { Server, Socket } from 'socket.io';
import { Injectable, Logger } from '@nestjs/common';
import {
  ClientToServerEvents,
  REALTIME_DELIVERY_EVENT,
  RealtimeDataEvent,
  ServerToClientEvents,
  subscriptionRoom,
} from '../../common/interfaces/websocket-events.interface';
import { TelemetryEvent } from '../../common/interfaces/telemetry-events.interface';
import { RealtimeFanoutService } from './realtime-fanout.service';

type TelemetrySocket = Socket<ClientToServerEvents, ServerToClientEvents>;

@Injectable()
@NestWebSocketGateway({
  cors: {
    origin: '*',
  },
  namespace: '/',
})
export class TelemetryGateway implements OnGatewayConnection, OnGatewayDisconnect {
  @WebSocketServer()
  server!: Server<ClientToServerEvents, ServerToClientEvents>;

  private logger: Logger = new Logger(TelemetryGateway.name);

  constructor(private readonly fanoutService: RealtimeFanoutService) {}

  handleConnection(client: TelemetrySocket) {
    this.logger.log(`Client connected: ${client.id}`);
  }

  handleDisconnect(client: TelemetrySocket) {
    this.logger.log(`Client disconnected: ${client.id}`);
  }

  @SubscribeMessage('subscribe_stream')
  async handleSubscribeStream(@ConnectedSocket() client: TelemetrySocket, @MessageBody() subscriptionId: string) {
    if (typeof subscriptionId !== 'string' || !this.fanoutService.getSubscription(subscriptionId)) {
      client.emit('subscription_error', {
        subscription_id: String(subscriptionId),
        error: 'Subscription not found',
      });
      return;
    }

    const room = subscriptionRoom(subscriptionId);
    await client.join(room);
    client.emit('subscription_ack', { subscription_id: subscriptionId, room });
    this.logger.log(`Client ${client.id} joined ${room}`);
  }

  @SubscribeMessage('unsubscribe_stream')
  async handleUnsubscribeStream(@ConnectedSocket() client: TelemetrySocket, @MessageBody() subscriptionId: string) {
    await client.leave(subscriptionRoom(subscriptionId));
  }

  @OnEvent(REALTIME_DELIVERY_EVENT)
  handleDelivery(event: RealtimeDataEvent) {
    this.server.to(subscriptionRoom(event.subscription_id)).emit('telemetry_data', event);
  }

  @OnEvent('alert.triggered')
  handleAlertTriggered(event: TelemetryEvent<'alert.triggered'>) {
    this.server.emit('alert_event', { type: 'alert.triggered', data: event.data });
  }

  @OnEvent('alert.resolved')
  handleAlertResolved(event: TelemetryEvent<'alert.resolved'>) {
    this.server.emit('alert_event', { type: 'alert.resolved', data: event.data });
  }
}
