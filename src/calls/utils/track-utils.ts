import {
  MediaStreamHandle,
  MediaTrack,
  MediaTrackKind,
} from '../interfaces/media-capture';

export function getTracksOfKind(
  stream: MediaStreamHandle | null,
  kind: MediaTrackKind,
): MediaTrack[] {
  if (!stream) {
    return [];
  }
  return stream.getTracks().filter((track) => track.kind === kind);
}

export function getFirstVideoTrack(
  stream: MediaStreamHandle | null,
): MediaTrack | null {
  return getTracksOfKind(stream, 'video')[0] ?? null;
}

/**
 * Enable or disable every track of a kind without releasing it, so it can be
 * re-enabled without renegotiation.
 */
export function setTracksEnabled(
  stream: MediaStreamHandle | null,
  kind: MediaTrackKind,
  enabled: boolean,
): void {
  for (const track of getTracksOfKind(stream, kind)) {
    track.enabled = enabled;
  }
}

export function describeStream(stream: MediaStreamHandle): string {
  const tracks = stream.getTracks();
  const audio = tracks.filter((track) => track.kind === 'audio').length;
  const video = tracks.length - audio;
  return `${audio} audio / ${video} video`;
}
