import { CallState } from './types/call.types';
import { InvalidStateError } from './errors/call.errors';

/**
 * Allowed call state transitions. Progress is monotonic; the only way back
 * is through `idle`, after a call has ended or failed. `connecting -> idle`
 * is reserved for an outgoing call that failed before its offer went out.
 */
const TRANSITIONS: Record<CallState, readonly CallState[]> = {
  idle: ['connecting', 'ringing'],
  connecting: ['ringing', 'connected', 'ended', 'error', 'idle'],
  ringing: ['connecting', 'connected', 'ended', 'error'],
  connected: ['ended', 'error'],
  ended: ['idle'],
  error: ['ended', 'idle'],
};

export function canTransition(from: CallState, to: CallState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(
  from: CallState,
  to: CallState,
  callId: string | null = null,
): void {
  if (!canTransition(from, to)) {
    throw new InvalidStateError(
      'transition',
      `Invalid call state transition ${from} -> ${to}`,
      callId,
    );
  }
}

// States in which a session is live and holds resources
export function isActiveState(state: CallState): boolean {
  return (
    state === 'connecting' || state === 'ringing' || state === 'connected'
  );
}
