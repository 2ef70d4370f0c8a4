import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { BehaviorSubject, Observable, Subject } from 'rxjs';
import { v4 as uuidv4 } from 'uuid';
import {
  AUDIO_ROUTING,
  CALL_COORDINATOR_OPTIONS,
  MEDIA_CAPTURE,
  PEER_TRANSPORT_FACTORY,
  SIGNALING_CHANNEL,
} from '../calls.constants';
import { CallSession } from '../entities/call-session.entity';
import {
  CallError,
  InvalidStateError,
  NegotiationError,
  SignalingError,
  createMediaAcquisitionError,
  toCallError,
} from '../errors/call.errors';
import { assertTransition } from '../call-state-machine';
import { CallCoordinatorOptions } from '../interfaces/call-coordinator-options';
import {
  AudioRouting,
  MediaCapture,
  MediaStreamHandle,
} from '../interfaces/media-capture';
import {
  IceCandidate,
  PeerConnectionState,
  PeerTransport,
  PeerTransportFactory,
} from '../interfaces/peer-transport';
import {
  SignalingChannel,
  Unsubscribe,
} from '../interfaces/signaling-channel';
import {
  CallDirection,
  CallEndedEvent,
  CallFlags,
  CallSessionSnapshot,
  CallState,
  CallType,
  HangupReason,
  IncomingCall,
} from '../types/call.types';
import {
  AnswerSignal,
  CallSignal,
  CandidateSignal,
  HangupSignal,
  OfferSignal,
} from '../../signaling/schemas/call-signal.schema';
import {
  describeStream,
  getFirstVideoTrack,
  setTracksEnabled,
} from '../utils/track-utils';

const DEFAULT_FLAGS: CallFlags = {
  muted: false,
  cameraOff: false,
  speakerOn: true,
  screenSharing: false,
};

/**
 * Owns the lifecycle of a single peer-to-peer call for the local user.
 *
 * All state changes happen synchronously inside the coordinator; operations
 * that wait on media, the peer transport or signaling re-check that their
 * session is still the current one after every await, and release whatever
 * they acquired if it is not.
 */
@Injectable()
export class CallSessionCoordinator implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CallSessionCoordinator.name);

  private session: CallSession | null = null;
  private state: CallState = 'idle';
  private subscriptions: Unsubscribe[] = [];
  private ringTimer: NodeJS.Timeout | null = null;
  private connectTimer: NodeJS.Timeout | null = null;
  private graceTimer: NodeJS.Timeout | null = null;

  private readonly stateSubject = new BehaviorSubject<CallState>('idle');
  private readonly localStreamSubject =
    new BehaviorSubject<MediaStreamHandle | null>(null);
  private readonly remoteStreamSubject =
    new BehaviorSubject<MediaStreamHandle | null>(null);
  private readonly flagsSubject = new BehaviorSubject<CallFlags>({
    ...DEFAULT_FLAGS,
  });
  private readonly incomingCallSubject = new Subject<IncomingCall>();
  private readonly sessionReadySubject = new Subject<CallSessionSnapshot>();
  private readonly callEndedSubject = new Subject<CallEndedEvent>();
  private readonly errorSubject = new Subject<CallError>();

  readonly callState$: Observable<CallState> = this.stateSubject.asObservable();
  readonly localStream$: Observable<MediaStreamHandle | null> =
    this.localStreamSubject.asObservable();
  readonly remoteStream$: Observable<MediaStreamHandle | null> =
    this.remoteStreamSubject.asObservable();
  readonly flags$: Observable<CallFlags> = this.flagsSubject.asObservable();
  readonly incomingCall$: Observable<IncomingCall> =
    this.incomingCallSubject.asObservable();
  // Emitted once per call when it is connected and both streams are bound
  readonly sessionReady$: Observable<CallSessionSnapshot> =
    this.sessionReadySubject.asObservable();
  readonly callEnded$: Observable<CallEndedEvent> =
    this.callEndedSubject.asObservable();
  readonly errors$: Observable<CallError> = this.errorSubject.asObservable();

  constructor(
    @Inject(SIGNALING_CHANNEL) private readonly signaling: SignalingChannel,
    @Inject(MEDIA_CAPTURE) private readonly media: MediaCapture,
    @Inject(PEER_TRANSPORT_FACTORY)
    private readonly peers: PeerTransportFactory,
    @Inject(AUDIO_ROUTING) private readonly audioRouting: AudioRouting,
    @Inject(CALL_COORDINATOR_OPTIONS)
    private readonly options: CallCoordinatorOptions,
  ) {}

  onModuleInit() {
    if (this.subscriptions.length > 0) {
      return;
    }
    this.subscriptions = [
      this.signaling.onSignal((signal) => this.handleSignal(signal)),
      this.signaling.onDisconnect((reason) =>
        this.handleSignalingDisconnect(reason),
      ),
    ];
    this.logger.log(
      `Listening for calls as ${this.signaling.localUserId}`,
    );
  }

  async onModuleDestroy() {
    const session = this.session;
    if (session) {
      await this.teardown(session, this.hangupReasonFor(session), true);
    }
    this.subscriptions.forEach((unsubscribe) => unsubscribe());
    this.subscriptions = [];
    this.clearCallTimers();
    this.clearGraceTimer();
    this.stateSubject.complete();
    this.localStreamSubject.complete();
    this.remoteStreamSubject.complete();
    this.flagsSubject.complete();
    this.incomingCallSubject.complete();
    this.sessionReadySubject.complete();
    this.callEndedSubject.complete();
    this.errorSubject.complete();
  }

  get callState(): CallState {
    return this.state;
  }

  get currentCallId(): string | null {
    return this.session?.callId ?? null;
  }

  get currentCallType(): CallType | null {
    return this.session?.callType ?? null;
  }

  get currentDirection(): CallDirection | null {
    return this.session?.direction ?? null;
  }

  get remoteUserId(): string | null {
    return this.session?.remoteUserId ?? null;
  }

  get flags(): CallFlags {
    return this.flagsSubject.getValue();
  }

  get localStream(): MediaStreamHandle | null {
    return this.localStreamSubject.getValue();
  }

  get remoteStream(): MediaStreamHandle | null {
    return this.remoteStreamSubject.getValue();
  }

  async startCall(recipientId: string, callType: CallType): Promise<boolean> {
    const rejection = this.checkCanStart(recipientId);
    if (rejection) {
      this.reportError(rejection);
      return false;
    }

    const session = new CallSession(
      uuidv4(),
      callType,
      'outgoing',
      recipientId,
      'idle',
    );
    this.activate(session);
    this.transition('connecting');
    this.logger.log(
      `[${session.callId}] Starting ${callType} call to ${recipientId}`,
    );

    try {
      if (!(await this.acquireLocalMedia(session))) {
        return false;
      }
      const transport = this.createTransport(session);
      const offer = await this.guard(
        () => transport.createOffer(callType),
        (error) => toCallError(error, NegotiationError, session.callId),
      );
      if (!this.isCurrent(session)) {
        return false;
      }
      await this.guard(
        () =>
          this.signaling.sendSignal({
            type: 'offer',
            callId: session.callId,
            from: this.signaling.localUserId,
            to: recipientId,
            callType,
            sdp: offer.sdp,
          }),
        (error) => toCallError(error, SignalingError, session.callId),
      );
    } catch (error) {
      const callError = toCallError(error, SignalingError, session.callId);
      this.abortOutgoing(session, callError);
      return false;
    }

    if (!this.isCurrent(session)) {
      return false;
    }
    session.signalled = true;
    // The answer may already have been applied while the offer was in flight
    if (this.isState('connecting')) {
      this.transition('ringing');
      if (this.isCurrent(session) && !session.remoteDescriptionSet) {
        this.startRingTimer(session);
      }
    }
    this.logger.log(`[${session.callId}] Offer sent to ${recipientId}`);
    return true;
  }

  async answerCall(callId: string): Promise<boolean> {
    const session = this.session;
    if (
      !callId ||
      !session ||
      session.direction !== 'incoming' ||
      session.callId !== callId ||
      this.state !== 'ringing'
    ) {
      this.reportError(
        new InvalidStateError(
          session ? 'call-mismatch' : 'no-session',
          `No incoming call ${callId || '(none)'} is ringing`,
          callId || null,
        ),
      );
      return false;
    }

    session.answered = true;
    this.clearCallTimers();
    this.transition('connecting');
    this.logger.log(`[${callId}] Answering call from ${session.remoteUserId}`);

    try {
      if (!(await this.acquireLocalMedia(session))) {
        return false;
      }
      const offer = session.remoteOffer;
      if (!offer) {
        throw new NegotiationError('Incoming call has no offer', callId);
      }
      const transport = this.createTransport(session);
      const answer = await this.guard(
        () => transport.createAnswer(session.callType, offer),
        (error) => toCallError(error, NegotiationError, callId),
      );
      if (!this.isCurrent(session)) {
        return false;
      }
      session.remoteDescriptionSet = true;
      await this.flushPendingCandidates(session);
      if (!this.isCurrent(session)) {
        return false;
      }
      await this.guard(
        () =>
          this.signaling.sendSignal({
            type: 'answer',
            callId,
            from: this.signaling.localUserId,
            to: session.remoteUserId,
            sdp: answer.sdp,
          }),
        (error) => toCallError(error, SignalingError, callId),
      );
    } catch (error) {
      await this.failSession(
        session,
        toCallError(error, NegotiationError, callId),
      );
      return false;
    }

    if (!this.isCurrent(session)) {
      return false;
    }
    if (this.isState('connecting')) {
      this.startConnectTimer(session);
    }
    return true;
  }

  /**
   * Ends the current call from any state. Calling it with no call in
   * progress does nothing.
   */
  async endCall(): Promise<void> {
    const session = this.session;
    if (!session) {
      this.logger.debug(`endCall ignored in state ${this.state}`);
      return;
    }
    this.logger.log(`[${session.callId}] Ending call`);
    await this.teardown(session, this.hangupReasonFor(session), true);
  }

  // Dismissing the incoming-call prompt without answering
  async declineCall(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    if (session.direction !== 'incoming' || session.answered) {
      return this.endCall();
    }
    this.logger.log(
      `[${session.callId}] Declining call from ${session.remoteUserId}`,
    );
    await this.teardown(session, 'declined', true);
  }

  toggleMute(): void {
    const session = this.session;
    if (!session) {
      return;
    }
    session.flags.muted = !session.flags.muted;
    setTracksEnabled(session.localStream, 'audio', !session.flags.muted);
    this.publishFlags(session);
    this.logger.log(
      `[${session.callId}] Microphone ${session.flags.muted ? 'muted' : 'unmuted'}`,
    );
  }

  toggleCamera(): void {
    const session = this.session;
    if (!session || !session.isVideo) {
      return;
    }
    session.flags.cameraOff = !session.flags.cameraOff;
    setTracksEnabled(session.localStream, 'video', !session.flags.cameraOff);
    this.publishFlags(session);
    this.logger.log(
      `[${session.callId}] Camera ${session.flags.cameraOff ? 'disabled' : 'enabled'}`,
    );
  }

  async switchCamera(): Promise<void> {
    const session = this.session;
    if (!session || !session.isVideo || session.flags.screenSharing) {
      return;
    }
    const track = getFirstVideoTrack(session.localStream);
    if (!track) {
      return;
    }
    try {
      await this.media.switchCamera(track);
      this.logger.log(`[${session.callId}] Camera switched`);
    } catch (error) {
      this.reportError(createMediaAcquisitionError(error, session.callId));
    }
  }

  async setSpeakerOn(on: boolean): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    try {
      await this.audioRouting.setSpeakerphoneOn(on);
    } catch (error) {
      this.logger.warn(
        `[${session.callId}] Could not route audio to ${on ? 'speaker' : 'earpiece'}: ${errorMessage(error)}`,
      );
      return;
    }
    if (!this.isCurrent(session)) {
      return;
    }
    session.flags.speakerOn = on;
    this.publishFlags(session);
  }

  toggleSpeaker(): Promise<void> {
    return this.setSpeakerOn(!this.flags.speakerOn);
  }

  enableScreenSharing(): Promise<void> {
    const session = this.session;
    if (!session || !session.isVideo) {
      this.logger.debug('Screen sharing is only available in video calls');
      return Promise.resolve();
    }
    return this.enqueueScreenShare(session, () =>
      this.startScreenShare(session),
    );
  }

  disableScreenSharing(): Promise<void> {
    const session = this.session;
    if (!session || !session.isVideo) {
      return Promise.resolve();
    }
    return this.enqueueScreenShare(session, () =>
      this.stopScreenShare(session),
    );
  }

  private checkCanStart(recipientId: string): InvalidStateError | null {
    if (this.session || this.state !== 'idle') {
      return new InvalidStateError(
        'busy',
        `Cannot start a call while ${this.state}`,
        this.session?.callId ?? null,
      );
    }
    if (!recipientId || recipientId === this.signaling.localUserId) {
      return new InvalidStateError(
        'self-call',
        `Invalid call recipient "${recipientId}"`,
      );
    }
    return null;
  }

  private activate(session: CallSession): void {
    this.clearGraceTimer();
    this.session = session;
    this.publishFlags(session);
  }

  private isCurrent(session: CallSession): boolean {
    return this.session === session;
  }

  // Observers may change the state from inside any transition or event
  private isState(state: CallState): boolean {
    return this.state === state;
  }

  private transition(to: CallState): void {
    const from = this.state;
    if (from === to) {
      return;
    }
    const callId = this.session?.callId ?? null;
    assertTransition(from, to, callId);
    this.state = to;
    if (this.session) {
      this.session.state = to;
    }
    this.logger.log(`[${callId ?? '-'}] Call state ${from} -> ${to}`);
    this.stateSubject.next(to);
  }

  private async guard<T>(
    operation: () => Promise<T>,
    wrap: (error: unknown) => CallError,
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw wrap(error);
    }
  }

  /**
   * Resolves false when the session was torn down while media was being
   * acquired; the stream is released in that case.
   */
  private async acquireLocalMedia(session: CallSession): Promise<boolean> {
    const stream = await this.guard(
      () =>
        this.media.acquireLocalMedia({ audio: true, video: session.isVideo }),
      (error) => createMediaAcquisitionError(error, session.callId),
    );
    if (!this.isCurrent(session)) {
      this.safely(session, 'release local media', () =>
        this.media.releaseLocalMedia(stream),
      );
      return false;
    }
    session.localStream = stream;
    this.localStreamSubject.next(stream);
    this.logger.log(
      `[${session.callId}] Local media acquired (${describeStream(stream)})`,
    );

    // Hands-free by default
    try {
      await this.audioRouting.setSpeakerphoneOn(session.flags.speakerOn);
    } catch (error) {
      this.logger.warn(
        `[${session.callId}] Could not route audio to speaker: ${errorMessage(error)}`,
      );
    }
    return this.isCurrent(session);
  }

  private createTransport(session: CallSession): PeerTransport {
    const transport = this.peers.create({
      onRemoteStream: (stream) => this.handleRemoteStream(session, stream),
      onIceCandidate: (candidate) =>
        this.handleLocalCandidate(session, candidate),
      onConnectionStateChange: (state) =>
        this.handleConnectionState(session, state),
    });
    session.transport = transport;
    if (session.localStream) {
      transport.addLocalStream(session.localStream);
    }
    return transport;
  }

  private handleSignal(signal: CallSignal): void {
    const localUserId = this.signaling.localUserId;
    if (signal.to !== localUserId || signal.from === localUserId) {
      return;
    }
    this.logger.debug(
      `[${signal.callId}] Received ${signal.type} from ${signal.from}`,
    );

    switch (signal.type) {
      case 'offer':
        this.handleOffer(signal);
        break;
      case 'answer':
        void this.handleAnswer(signal);
        break;
      case 'candidate':
        void this.handleRemoteCandidate(signal);
        break;
      case 'hangup':
        void this.handleHangup(signal);
        break;
    }
  }

  private handleOffer(signal: OfferSignal): void {
    const current = this.session;
    if (current?.callId === signal.callId) {
      return;
    }
    if (current || this.state !== 'idle') {
      this.logger.log(
        `[${signal.callId}] Rejecting call from ${signal.from}: busy in state ${this.state}`,
      );
      void this.sendSignalSafely({
        type: 'hangup',
        callId: signal.callId,
        from: this.signaling.localUserId,
        to: signal.from,
        reason: 'busy',
      });
      return;
    }

    const session = new CallSession(
      signal.callId,
      signal.callType,
      'incoming',
      signal.from,
      'idle',
    );
    session.remoteOffer = { type: 'offer', sdp: signal.sdp };
    session.signalled = true;
    this.activate(session);
    this.transition('ringing');
    if (!this.isCurrent(session)) {
      return;
    }
    this.startRingTimer(session);
    this.logger.log(
      `[${signal.callId}] Incoming ${signal.callType} call from ${signal.from}`,
    );
    this.incomingCallSubject.next({
      callId: signal.callId,
      callerId: signal.from,
      callType: signal.callType,
    });
  }

  private async handleAnswer(signal: AnswerSignal): Promise<void> {
    const session = this.session;
    if (
      !session ||
      session.callId !== signal.callId ||
      session.direction !== 'outgoing' ||
      session.remoteDescriptionSet
    ) {
      return;
    }
    const transport = session.transport;
    if (!transport) {
      return;
    }

    try {
      await transport.applyAnswer({ type: 'answer', sdp: signal.sdp });
    } catch (error) {
      await this.failSession(
        session,
        toCallError(error, NegotiationError, session.callId),
      );
      return;
    }
    if (!this.isCurrent(session)) {
      return;
    }
    session.remoteDescriptionSet = true;
    this.logger.log(`[${session.callId}] Call answered by ${signal.from}`);
    if (!this.isState('connected')) {
      this.startConnectTimer(session);
    }
    await this.flushPendingCandidates(session);
  }

  private async handleRemoteCandidate(signal: CandidateSignal): Promise<void> {
    const session = this.session;
    if (!session || session.callId !== signal.callId) {
      return;
    }
    if (!session.transport || !session.remoteDescriptionSet) {
      session.pendingCandidates.push(signal.candidate);
      return;
    }
    await this.addCandidate(session, session.transport, signal.candidate);
  }

  private async handleHangup(signal: HangupSignal): Promise<void> {
    const session = this.session;
    if (!session || session.callId !== signal.callId) {
      return;
    }
    this.logger.log(
      `[${session.callId}] Call ended by ${signal.from} (${signal.reason})`,
    );
    await this.teardown(session, signal.reason, false);
  }

  private handleSignalingDisconnect(reason: string): void {
    const session = this.session;
    if (!session) {
      return;
    }
    void this.failSession(
      session,
      new SignalingError(
        `Signaling channel disconnected: ${reason}`,
        session.callId,
      ),
    );
  }

  private handleRemoteStream(
    session: CallSession,
    stream: MediaStreamHandle | null,
  ): void {
    if (!this.isCurrent(session)) {
      return;
    }
    session.remoteStream = stream;
    this.remoteStreamSubject.next(stream);
    if (stream) {
      this.logger.log(
        `[${session.callId}] Remote media bound (${describeStream(stream)})`,
      );
    }
    this.emitReadyIfStable(session);
  }

  private handleLocalCandidate(
    session: CallSession,
    candidate: IceCandidate,
  ): void {
    if (!this.isCurrent(session)) {
      return;
    }
    void this.sendSignalSafely({
      type: 'candidate',
      callId: session.callId,
      from: this.signaling.localUserId,
      to: session.remoteUserId,
      candidate,
    });
  }

  private handleConnectionState(
    session: CallSession,
    state: PeerConnectionState,
  ): void {
    if (!this.isCurrent(session)) {
      return;
    }
    this.logger.debug(`[${session.callId}] Peer connection ${state}`);

    switch (state) {
      case 'connected':
        if (this.isState('connecting') || this.isState('ringing')) {
          this.clearCallTimers();
          this.transition('connected');
          if (this.isCurrent(session)) {
            this.emitReadyIfStable(session);
          }
        }
        break;
      case 'failed':
      case 'disconnected':
        void this.failSession(
          session,
          new NegotiationError(`Peer connection ${state}`, session.callId),
        );
        break;
      default:
        break;
    }
  }

  private emitReadyIfStable(session: CallSession): void {
    if (
      session.readyEmitted ||
      this.state !== 'connected' ||
      !session.localStream ||
      !session.remoteStream
    ) {
      return;
    }
    session.readyEmitted = true;
    this.logger.log(`[${session.callId}] Session ready`);
    this.sessionReadySubject.next(session.snapshot());
  }

  private async flushPendingCandidates(session: CallSession): Promise<void> {
    const transport = session.transport;
    if (!transport || session.pendingCandidates.length === 0) {
      return;
    }
    const candidates = session.pendingCandidates;
    session.pendingCandidates = [];
    this.logger.debug(
      `[${session.callId}] Applying ${candidates.length} queued ICE candidates`,
    );
    for (const candidate of candidates) {
      if (!this.isCurrent(session)) {
        return;
      }
      await this.addCandidate(session, transport, candidate);
    }
  }

  private async addCandidate(
    session: CallSession,
    transport: PeerTransport,
    candidate: IceCandidate,
  ): Promise<void> {
    try {
      await transport.addIceCandidate(candidate);
    } catch (error) {
      this.logger.warn(
        `[${session.callId}] Ignoring rejected ICE candidate: ${errorMessage(error)}`,
      );
    }
  }

  private enqueueScreenShare(
    session: CallSession,
    task: () => Promise<void>,
  ): Promise<void> {
    const run = session.screenShareQueue.then(task);
    session.screenShareQueue = run.catch(() => undefined);
    return run;
  }

  private async startScreenShare(session: CallSession): Promise<void> {
    const transport = session.transport;
    if (!this.isCurrent(session) || session.flags.screenSharing) {
      return;
    }
    if (!transport) {
      this.logger.debug(
        `[${session.callId}] Screen sharing needs an established peer connection`,
      );
      return;
    }

    let screen: MediaStreamHandle;
    try {
      screen = await this.media.acquireScreenMedia();
    } catch (error) {
      this.reportError(createMediaAcquisitionError(error, session.callId));
      return;
    }
    const screenTrack = getFirstVideoTrack(screen);
    if (!screenTrack || !this.isCurrent(session)) {
      this.safely(session, 'release screen media', () =>
        this.media.releaseLocalMedia(screen),
      );
      return;
    }

    try {
      await transport.replaceVideoTrack(screenTrack);
    } catch (error) {
      this.safely(session, 'release screen media', () =>
        this.media.releaseLocalMedia(screen),
      );
      this.reportError(toCallError(error, NegotiationError, session.callId));
      return;
    }
    if (!this.isCurrent(session)) {
      this.safely(session, 'release screen media', () =>
        this.media.releaseLocalMedia(screen),
      );
      return;
    }

    session.screenStream = screen;
    session.flags.screenSharing = true;
    screenTrack.onended = () => {
      if (this.isCurrent(session)) {
        this.logger.log(`[${session.callId}] Screen capture ended`);
        void this.disableScreenSharing();
      }
    };
    this.localStreamSubject.next(screen);
    this.publishFlags(session);
    this.logger.log(`[${session.callId}] Screen sharing enabled`);
  }

  private async stopScreenShare(session: CallSession): Promise<void> {
    if (!this.isCurrent(session) || !session.flags.screenSharing) {
      return;
    }
    const screen = session.screenStream;
    const cameraTrack = getFirstVideoTrack(session.localStream);
    session.screenStream = null;
    session.flags.screenSharing = false;

    if (cameraTrack && session.transport) {
      try {
        await session.transport.replaceVideoTrack(cameraTrack);
      } catch (error) {
        this.reportError(toCallError(error, NegotiationError, session.callId));
      }
    }
    if (screen) {
      screen.getTracks().forEach((track) => {
        track.onended = null;
      });
      this.safely(session, 'release screen media', () =>
        this.media.releaseLocalMedia(screen),
      );
    }
    if (!this.isCurrent(session)) {
      return;
    }
    this.localStreamSubject.next(session.localStream);
    this.publishFlags(session);
    this.logger.log(`[${session.callId}] Screen sharing disabled`);
  }

  private startRingTimer(session: CallSession): void {
    this.clearCallTimers();
    this.ringTimer = setTimeout(() => {
      this.ringTimer = null;
      if (!this.isCurrent(session) || this.state !== 'ringing') {
        return;
      }
      this.logger.log(
        `[${session.callId}] No answer after ${this.options.ringTimeoutMs}ms`,
      );
      void this.teardown(session, 'timeout', true);
    }, this.options.ringTimeoutMs);
  }

  private startConnectTimer(session: CallSession): void {
    this.clearCallTimers();
    this.connectTimer = setTimeout(() => {
      this.connectTimer = null;
      if (!this.isCurrent(session) || this.state === 'connected') {
        return;
      }
      void this.failSession(
        session,
        new NegotiationError(
          `Call did not connect within ${this.options.connectTimeoutMs}ms`,
          session.callId,
        ),
      );
    }, this.options.connectTimeoutMs);
  }

  private clearCallTimers(): void {
    if (this.ringTimer) {
      clearTimeout(this.ringTimer);
      this.ringTimer = null;
    }
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private clearGraceTimer(): void {
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
  }

  private hangupReasonFor(session: CallSession): HangupReason {
    return session.direction === 'incoming' && !session.answered
      ? 'declined'
      : 'ended';
  }

  // Outgoing call failed before its offer was sent: nothing to tell the peer
  private abortOutgoing(session: CallSession, error: CallError): void {
    if (!this.isCurrent(session)) {
      this.reportError(error);
      return;
    }
    this.session = null;
    this.clearCallTimers();
    this.releaseResources(session);
    this.publishFlags(null);
    this.transition('idle');
    this.reportError(error);
  }

  private async failSession(
    session: CallSession,
    error: CallError,
  ): Promise<void> {
    if (!this.isCurrent(session)) {
      return;
    }
    this.transition('error');
    this.reportError(error);
    await this.teardown(session, 'error', true);
  }

  /**
   * Releases everything the session holds and moves to `ended`; `idle`
   * follows after the grace delay. Only the first call for a session has
   * any effect.
   */
  private async teardown(
    session: CallSession,
    reason: HangupReason,
    notifyPeer: boolean,
  ): Promise<void> {
    if (!this.isCurrent(session)) {
      return;
    }
    this.session = null;
    this.clearCallTimers();

    const delivery =
      notifyPeer && session.signalled
        ? this.sendSignalSafely({
            type: 'hangup',
            callId: session.callId,
            from: this.signaling.localUserId,
            to: session.remoteUserId,
            reason,
          })
        : Promise.resolve();

    this.releaseResources(session);
    this.publishFlags(null);
    this.transition('ended');
    this.callEndedSubject.next({
      callId: session.callId,
      reason,
      remote: !notifyPeer,
    });
    this.scheduleIdle();
    this.logger.log(`[${session.callId}] Call ended (${reason})`);

    await delivery;
  }

  private releaseResources(session: CallSession): void {
    const { localStream, screenStream, transport } = session;
    session.localStream = null;
    session.screenStream = null;
    session.remoteStream = null;
    session.transport = null;
    session.pendingCandidates = [];

    if (screenStream) {
      this.safely(session, 'release screen media', () =>
        this.media.releaseLocalMedia(screenStream),
      );
    }
    if (localStream) {
      this.safely(session, 'release local media', () =>
        this.media.releaseLocalMedia(localStream),
      );
    }
    if (transport) {
      this.safely(session, 'close peer connection', () => transport.close());
    }
    if (this.localStreamSubject.getValue()) {
      this.localStreamSubject.next(null);
    }
    if (this.remoteStreamSubject.getValue()) {
      this.remoteStreamSubject.next(null);
    }
  }

  private scheduleIdle(): void {
    this.clearGraceTimer();
    this.graceTimer = setTimeout(() => {
      this.graceTimer = null;
      if (this.state === 'ended' || this.state === 'error') {
        this.transition('idle');
      }
    }, this.options.endGraceMs);
  }

  private publishFlags(session: CallSession | null): void {
    this.flagsSubject.next(
      session ? { ...session.flags } : { ...DEFAULT_FLAGS },
    );
  }

  private async sendSignalSafely(signal: CallSignal): Promise<void> {
    try {
      await this.signaling.sendSignal(signal);
    } catch (error) {
      this.logger.warn(
        `[${signal.callId}] Could not send ${signal.type} to ${signal.to}: ${errorMessage(error)}`,
      );
    }
  }

  private safely(session: CallSession, action: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.warn(
        `[${session.callId}] Failed to ${action}: ${errorMessage(error)}`,
      );
    }
  }

  private reportError(error: CallError): void {
    const prefix = `[${error.callId ?? '-'}]`;
    if (error instanceof InvalidStateError) {
      this.logger.warn(`${prefix} ${error.message}`);
    } else {
      this.logger.error(`${prefix} ${error.name}: ${error.message}`);
    }
    this.errorSubject.next(error);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
