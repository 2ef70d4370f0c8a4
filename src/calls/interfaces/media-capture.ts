export type MediaTrackKind = 'audio' | 'video';

/**
 * A single audio or video track. Mirrors the parts of `MediaStreamTrack`
 * the coordinator relies on, so any platform binding can be adapted to it.
 */
export interface MediaTrack {
  readonly id: string;
  readonly kind: MediaTrackKind;
  enabled: boolean;
  // Fired when the track ends outside our control (e.g. the user stops a screen share)
  onended: (() => void) | null;
  stop(): void;
}

export interface MediaStreamHandle {
  readonly id: string;
  getTracks(): MediaTrack[];
}

export interface LocalMediaOptions {
  audio: true;
  video: boolean;
}

/**
 * Platform facility granting access to camera, microphone and screen capture.
 * Rejections are expected to carry the platform error name
 * (`NotAllowedError`, `NotReadableError`, ...).
 */
export interface MediaCapture {
  acquireLocalMedia(options: LocalMediaOptions): Promise<MediaStreamHandle>;
  acquireScreenMedia(): Promise<MediaStreamHandle>;
  releaseLocalMedia(stream: MediaStreamHandle): void;
  switchCamera(track: MediaTrack): Promise<void>;
}

export interface AudioRouting {
  setSpeakerphoneOn(on: boolean): Promise<void>;
}
