import { HangupSignal } from '../../signaling/schemas/call-signal.schema';

export type CallState =
  | 'idle' // No session
  | 'connecting' // Acquiring media / negotiating
  | 'ringing' // Offer out, or incoming offer waiting for the user
  | 'connected'
  | 'ended'
  | 'error';

export type CallType = 'audio' | 'video';

export type CallDirection = 'outgoing' | 'incoming';

export type HangupReason = HangupSignal['reason'];

export interface CallFlags {
  muted: boolean;
  cameraOff: boolean;
  speakerOn: boolean;
  screenSharing: boolean;
}

export interface IncomingCall {
  callId: string;
  callerId: string;
  callType: CallType;
}

export interface CallEndedEvent {
  callId: string;
  reason: HangupReason;
  // true when the other party (or the relay) ended the call
  remote: boolean;
}

export interface CallSessionSnapshot {
  callId: string;
  callType: CallType;
  direction: CallDirection;
  remoteUserId: string;
  state: CallState;
  flags: CallFlags;
}
