import { Injectable, Logger } from '@nestjs/common';
import { SignalingError } from '../../calls/errors/call.errors';
import {
  RelaySignalingChannel,
  SignalRelay,
} from '../relay-signaling-channel';
import { CallSignal, parseCallSignal } from '../schemas/call-signal.schema';
import { CallRegistryService } from './call-registry.service';

/**
 * Routes call signals between connected users and keeps the call registry
 * in step with them.
 */
@Injectable()
export class SignalingRelayService implements SignalRelay {
  private readonly logger = new Logger(SignalingRelayService.name);
  private readonly endpoints = new Map<string, Set<RelaySignalingChannel>>();

  constructor(private readonly callRegistry: CallRegistryService) {}

  connect(userId: string): RelaySignalingChannel {
    if (!userId) {
      throw new SignalingError('userId is required for signaling');
    }
    const channel = new RelaySignalingChannel(userId, this);
    let channels = this.endpoints.get(userId);
    if (!channels) {
      channels = new Set();
      this.endpoints.set(userId, channels);
    }
    channels.add(channel);
    this.logger.log(
      `${userId} connected (${channels.size} endpoint${channels.size === 1 ? '' : 's'})`,
    );
    return channel;
  }

  isOnline(userId: string): boolean {
    return (this.endpoints.get(userId)?.size ?? 0) > 0;
  }

  disconnect(channel: RelaySignalingChannel): void {
    const userId = channel.localUserId;
    const channels = this.endpoints.get(userId);
    if (!channels?.delete(channel) || channels.size > 0) {
      return;
    }
    this.endpoints.delete(userId);
    this.logger.log(`${userId} disconnected`);

    // The other party of every call still in progress would otherwise wait for a timeout
    for (const call of this.callRegistry.getCallsForUser(userId)) {
      this.relay({
        type: 'hangup',
        callId: call.callId,
        from: userId,
        to: call.otherParty(userId),
        reason: 'unavailable',
      });
    }
  }

  relay(input: unknown): CallSignal {
    const parsed = parseCallSignal(input);
    if (!parsed.success) {
      throw new SignalingError(`Invalid signal: ${parsed.error}`);
    }
    const signal = parsed.signal;
    this.callRegistry.recordSignal(signal);

    const recipients = this.endpoints.get(signal.to);
    if (!recipients || recipients.size === 0) {
      this.logger.debug(
        `[${signal.callId}] Dropping ${signal.type}: ${signal.to} is not connected`,
      );
      if (signal.type === 'offer') {
        this.relay({
          type: 'hangup',
          callId: signal.callId,
          from: signal.to,
          to: signal.from,
          reason: 'unavailable',
        });
      }
      return signal;
    }

    this.logger.debug(
      `[${signal.callId}] Relaying ${signal.type} ${signal.from} -> ${signal.to}`,
    );
    recipients.forEach((channel) => channel.deliver(signal));
    return signal;
  }
}
