import {
  CallDirection,
  CallFlags,
  CallSessionSnapshot,
  CallState,
  CallType,
} from '../types/call.types';
import { MediaStreamHandle } from '../interfaces/media-capture';
import {
  IceCandidate,
  PeerTransport,
  SessionDescription,
} from '../interfaces/peer-transport';

// Per-call state owned by the coordinator
export class CallSession {
  readonly callId: string;
  readonly callType: CallType;
  readonly direction: CallDirection;
  readonly remoteUserId: string;
  readonly createdAt: Date;
  state: CallState;
  flags: CallFlags = {
    muted: false,
    cameraOff: false,
    speakerOn: true,
    screenSharing: false,
  };

  localStream: MediaStreamHandle | null = null;
  screenStream: MediaStreamHandle | null = null;
  remoteStream: MediaStreamHandle | null = null;
  transport: PeerTransport | null = null;

  // Offer received for an incoming call, applied when the user answers
  remoteOffer: SessionDescription | null = null;
  remoteDescriptionSet = false;
  pendingCandidates: IceCandidate[] = [];

  // true once the peer knows about the call (offer sent or received)
  signalled = false;
  answered = false;
  readyEmitted = false;
  // Serializes screen-share enable/disable so the track is never replaced twice
  screenShareQueue: Promise<void> = Promise.resolve();

  constructor(
    callId: string,
    callType: CallType,
    direction: CallDirection,
    remoteUserId: string,
    state: CallState,
  ) {
    this.callId = callId;
    this.callType = callType;
    this.direction = direction;
    this.remoteUserId = remoteUserId;
    this.state = state;
    this.createdAt = new Date();
  }

  get isVideo(): boolean {
    return this.callType === 'video';
  }

  snapshot(): CallSessionSnapshot {
    return {
      callId: this.callId,
      callType: this.callType,
      direction: this.direction,
      remoteUserId: this.remoteUserId,
      state: this.state,
      flags: { ...this.flags },
    };
  }
}
