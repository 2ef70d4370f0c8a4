import {
  SubscribeMessage,
  WebSocketGateway,
  WebSocketServer,
  OnGatewayInit,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { Logger } from '@nestjs/common';
import { validateSync } from '@nestjs/class-validator';
import { Server, Socket } from 'socket.io';
import { RegisterPeerDto } from './dto/register-peer.dto';
import { RelaySignalingChannel } from './relay-signaling-channel';
import { SignalingRelayService } from './services/signaling-relay.service';

export type SignalingSocket = Pick<Socket, 'id' | 'emit'>;

export type GatewayAck = { ok: true } | { ok: false; error: string };

@WebSocketGateway({
  cors: {
    origin: '*', // Allow connections from any origin
  },
})
export class SignalingGateway
  implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect
{
  private readonly logger = new Logger(SignalingGateway.name);
  private readonly channels = new Map<string, RelaySignalingChannel>();

  @WebSocketServer()
  server!: Server;

  constructor(private readonly relayService: SignalingRelayService) {}

  afterInit() {
    this.logger.log('Signaling gateway initialized');
  }

  handleConnection(client: SignalingSocket) {
    this.logger.log(`Client connected: ${client.id}`);
  }

  handleDisconnect(client: SignalingSocket) {
    this.logger.log(`Client disconnected: ${client.id}`);
    this.release(client.id, 'socket disconnected');
  }

  @SubscribeMessage('register')
  handleRegister(client: SignalingSocket, payload: unknown): GatewayAck {
    const dto = Object.assign(
      new RegisterPeerDto(),
      typeof payload === 'object' && payload !== null ? payload : {},
    );
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const error = errors
        .flatMap((e) => Object.values(e.constraints ?? {}))
        .join('; ');
      this.logger.warn(`Rejected registration from ${client.id}: ${error}`);
      return { ok: false, error };
    }

    this.release(client.id, 're-registered');
    const channel = this.relayService.connect(dto.userId);
    channel.onSignal((signal) => {
      client.emit('signal', signal);
    });
    this.channels.set(client.id, channel);
    this.logger.log(`Client ${client.id} registered as ${dto.userId}`);
    return { ok: true };
  }

  @SubscribeMessage('signal')
  handleSignal(client: SignalingSocket, payload: unknown): GatewayAck {
    const channel = this.channels.get(client.id);
    if (!channel) {
      return { ok: false, error: 'Register before sending signals' };
    }
    if (typeof payload !== 'object' || payload === null) {
      return { ok: false, error: 'Signal must be an object' };
    }
    try {
      // Clients can only speak for the user they registered as
      this.relayService.relay({ ...payload, from: channel.localUserId });
      return { ok: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Rejected signal from ${client.id}: ${message}`);
      return { ok: false, error: message };
    }
  }

  private release(clientId: string, reason: string): void {
    const channel = this.channels.get(clientId);
    if (!channel) {
      return;
    }
    this.channels.delete(clientId);
    channel.close(reason);
  }
}
