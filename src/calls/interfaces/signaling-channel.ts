import { CallSignal } from '../../signaling/schemas/call-signal.schema';

export type SignalHandler = (signal: CallSignal) => void;
export type DisconnectHandler = (reason: string) => void;
export type Unsubscribe = () => void;

/**
 * Out-of-band exchange of call-setup messages for one local user.
 */
export interface SignalingChannel {
  readonly localUserId: string;
  sendSignal(signal: CallSignal): Promise<void>;
  onSignal(handler: SignalHandler): Unsubscribe;
  onDisconnect(handler: DisconnectHandler): Unsubscribe;
}
