export * from './calls/calls.module';
export * from './calls/calls.constants';
export * from './calls/call-state-machine';
export * from './calls/errors/call.errors';
export * from './calls/interfaces/call-coordinator-options';
export * from './calls/interfaces/media-capture';
export * from './calls/interfaces/peer-transport';
export * from './calls/interfaces/signaling-channel';
export * from './calls/services/call-session-coordinator.service';
export * from './calls/types/call.types';
export * from './signaling/signaling.module';
export * from './signaling/relay-signaling-channel';
export * from './signaling/schemas/call-signal.schema';
export * from './signaling/services/call-registry.service';
export * from './signaling/services/signaling-relay.service';
