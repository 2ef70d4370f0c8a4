export const SIGNALING_CHANNEL = Symbol('SIGNALING_CHANNEL');
export const MEDIA_CAPTURE = Symbol('MEDIA_CAPTURE');
export const AUDIO_ROUTING = Symbol('AUDIO_ROUTING');
export const PEER_TRANSPORT_FACTORY = Symbol('PEER_TRANSPORT_FACTORY');
export const CALL_COORDINATOR_OPTIONS = Symbol('CALL_COORDINATOR_OPTIONS');
