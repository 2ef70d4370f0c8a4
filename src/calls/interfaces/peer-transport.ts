import { CallType } from '../types/call.types';
import { MediaStreamHandle, MediaTrack } from './media-capture';

export interface SessionDescription {
  type: 'offer' | 'answer';
  sdp: string;
}

export interface IceCandidate {
  candidate: string;
  sdpMid: string | null;
  sdpMLineIndex: number | null;
}

export type PeerConnectionState =
  | 'new'
  | 'connecting'
  | 'connected'
  | 'disconnected'
  | 'failed'
  | 'closed';

export interface PeerTransportEvents {
  onRemoteStream: (stream: MediaStreamHandle | null) => void;
  onIceCandidate: (candidate: IceCandidate) => void;
  onConnectionStateChange: (state: PeerConnectionState) => void;
}

/**
 * One peer connection. Codec negotiation, ICE and media transport are owned
 * by the implementation (a WebRTC binding); the coordinator only drives the
 * offer/answer exchange and the outgoing video track.
 */
export interface PeerTransport {
  addLocalStream(stream: MediaStreamHandle): void;
  createOffer(callType: CallType): Promise<SessionDescription>;
  createAnswer(
    callType: CallType,
    offer: SessionDescription,
  ): Promise<SessionDescription>;
  applyAnswer(answer: SessionDescription): Promise<void>;
  addIceCandidate(candidate: IceCandidate): Promise<void>;
  replaceVideoTrack(track: MediaTrack): Promise<void>;
  close(): void;
}

export interface PeerTransportFactory {
  create(events: PeerTransportEvents): PeerTransport;
}
