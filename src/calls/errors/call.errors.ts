/**
 * Error taxonomy for call sessions.
 *
 * Media and state errors are reported to the caller of `startCall` /
 * `answerCall` as a `false` result; signaling and negotiation errors that
 * happen once a call is under way surface through the coordinator's
 * `errors$` and state streams.
 */

export type CallErrorCode =
  | 'media-acquisition'
  | 'signaling'
  | 'negotiation'
  | 'invalid-state';

export type InvalidStateReason =
  | 'busy'
  | 'no-session'
  | 'call-mismatch'
  | 'self-call'
  | 'transition';

export type MediaErrorKind =
  | 'permission-denied'
  | 'device-busy'
  | 'device-not-found'
  | 'unknown';

export abstract class CallError extends Error {
  abstract readonly code: CallErrorCode;

  constructor(
    message: string,
    readonly callId: string | null = null,
    readonly originalError?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MediaAcquisitionError extends CallError {
  readonly code = 'media-acquisition' as const;

  constructor(
    readonly kind: MediaErrorKind,
    callId: string | null = null,
    originalError?: unknown,
  ) {
    super(MEDIA_ERROR_MESSAGES[kind], callId, originalError);
  }
}

export class SignalingError extends CallError {
  readonly code = 'signaling' as const;
}

export class NegotiationError extends CallError {
  readonly code = 'negotiation' as const;
}

export class InvalidStateError extends CallError {
  readonly code = 'invalid-state' as const;

  constructor(
    readonly reason: InvalidStateReason,
    message: string,
    callId: string | null = null,
  ) {
    super(message, callId);
  }
}

const MEDIA_ERROR_MESSAGES: Record<MediaErrorKind, string> = {
  'permission-denied':
    'Camera or microphone permission was denied. Allow access and try again.',
  'device-busy':
    'Camera or microphone is in use by another application.',
  'device-not-found': 'No camera or microphone was found.',
  unknown: 'Could not access the camera or microphone.',
};

// Platform error names, as thrown by getUserMedia/getDisplayMedia
const MEDIA_ERROR_NAME_MAP: Record<string, MediaErrorKind> = {
  NotAllowedError: 'permission-denied',
  SecurityError: 'permission-denied',
  PermissionDeniedError: 'permission-denied',
  NotReadableError: 'device-busy',
  TrackStartError: 'device-busy',
  AbortError: 'device-busy',
  NotFoundError: 'device-not-found',
  DevicesNotFoundError: 'device-not-found',
  OverconstrainedError: 'device-not-found',
};

export function mapMediaErrorName(name: string): MediaErrorKind {
  return MEDIA_ERROR_NAME_MAP[name] ?? 'unknown';
}

export function createMediaAcquisitionError(
  error: unknown,
  callId: string | null = null,
): MediaAcquisitionError {
  if (error instanceof MediaAcquisitionError) {
    return error;
  }
  const kind = error instanceof Error ? mapMediaErrorName(error.name) : 'unknown';
  return new MediaAcquisitionError(kind, callId, error);
}

/**
 * Wraps an unknown thrown value into a CallError, keeping CallErrors as-is.
 */
export function toCallError(
  error: unknown,
  fallback: new (
    message: string,
    callId: string | null,
    originalError?: unknown,
  ) => CallError,
  callId: string | null = null,
): CallError {
  if (error instanceof CallError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new fallback(message, callId, error);
}
