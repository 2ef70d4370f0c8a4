import { Logger } from '@nestjs/common';
import {
  DisconnectHandler,
  SignalHandler,
  SignalingChannel,
  Unsubscribe,
} from '../calls/interfaces/signaling-channel';
import { SignalingError } from '../calls/errors/call.errors';
import { CallSignal } from './schemas/call-signal.schema';

export interface SignalRelay {
  relay(input: unknown): CallSignal;
  disconnect(channel: RelaySignalingChannel): void;
}

/**
 * A user's endpoint on the relay. Used directly by in-process coordinators
 * and by the socket gateway for remote clients.
 */
export class RelaySignalingChannel implements SignalingChannel {
  private readonly logger = new Logger(RelaySignalingChannel.name);
  private readonly signalHandlers = new Set<SignalHandler>();
  private readonly disconnectHandlers = new Set<DisconnectHandler>();
  private closed = false;

  constructor(
    readonly localUserId: string,
    private readonly relay: SignalRelay,
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  async sendSignal(signal: CallSignal): Promise<void> {
    if (this.closed) {
      throw new SignalingError(
        `Signaling channel for ${this.localUserId} is closed`,
        signal.callId,
      );
    }
    if (signal.from !== this.localUserId) {
      throw new SignalingError(
        `${this.localUserId} cannot send signals as ${signal.from}`,
        signal.callId,
      );
    }
    this.relay.relay(signal);
  }

  onSignal(handler: SignalHandler): Unsubscribe {
    this.signalHandlers.add(handler);
    return () => {
      this.signalHandlers.delete(handler);
    };
  }

  onDisconnect(handler: DisconnectHandler): Unsubscribe {
    this.disconnectHandlers.add(handler);
    return () => {
      this.disconnectHandlers.delete(handler);
    };
  }

  // Handlers run on a later microtask, never inside the sender's call stack
  deliver(signal: CallSignal): void {
    if (this.closed) {
      return;
    }
    for (const handler of Array.from(this.signalHandlers)) {
      Promise.resolve()
        .then(() => {
          if (!this.closed) {
            handler(signal);
          }
        })
        .catch((error: unknown) => {
          this.logger.error(
            `[${signal.callId}] Signal handler for ${this.localUserId} failed: ${error instanceof Error ? error.message : String(error)}`,
          );
        });
    }
  }

  close(reason: string = 'closed'): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.relay.disconnect(this);
    const handlers = Array.from(this.disconnectHandlers);
    this.signalHandlers.clear();
    this.disconnectHandlers.clear();
    handlers.forEach((handler) => handler(reason));
  }
}
