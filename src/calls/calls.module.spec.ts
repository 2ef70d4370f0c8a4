import { Test, TestingModule } from '@nestjs/testing';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { CallsModule } from './calls.module';
import { CALL_COORDINATOR_OPTIONS } from './calls.constants';
import {
  callCoordinatorOptionsFactory,
  readConfigNumber,
} from './calls.config';
import { CallSessionCoordinator } from './services/call-session-coordinator.service';
import { FakeAudioRouting, FakeMediaCapture } from './testing/fake-media';
import { FakePeerTransportFactory } from './testing/fake-peer-transport';
import { SignalingModule } from '../signaling/signaling.module';
import { SignalingRelayService } from '../signaling/services/signaling-relay.service';
import { CallRegistryService } from '../signaling/services/call-registry.service';
import { CallEndedEvent } from './types/call.types';

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('CallsModule', () => {
  let module: TestingModule;
  let alice: CallSessionCoordinator;
  let bob: CallSessionCoordinator;
  let aliceMedia: FakeMediaCapture;
  let bobMedia: FakeMediaCapture;
  let alicePeers: FakePeerTransportFactory;
  let bobPeers: FakePeerTransportFactory;
  let registry: CallRegistryService;

  beforeEach(async () => {
    aliceMedia = new FakeMediaCapture();
    alicePeers = new FakePeerTransportFactory();

    module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ CALL_RING_TIMEOUT_SECONDS: 20 })],
        }),
        CallsModule.forRoot({
          imports: [SignalingModule],
          signaling: {
            useFactory: (relay: SignalingRelayService) =>
              relay.connect('alice'),
            inject: [SignalingRelayService],
          },
          mediaCapture: aliceMedia,
          peerTransportFactory: alicePeers,
        }),
      ],
    }).compile();
    await module.init();

    alice = module.get<CallSessionCoordinator>(CallSessionCoordinator);
    registry = module.get<CallRegistryService>(CallRegistryService);

    // Second user on the same relay
    bobMedia = new FakeMediaCapture();
    bobPeers = new FakePeerTransportFactory();
    bob = new CallSessionCoordinator(
      module.get<SignalingRelayService>(SignalingRelayService).connect('bob'),
      bobMedia,
      bobPeers,
      new FakeAudioRouting(),
      { ringTimeoutMs: 45_000, connectTimeoutMs: 30_000, endGraceMs: 500 },
    );
    bob.onModuleInit();
  });

  afterEach(async () => {
    await bob.onModuleDestroy();
    await module.close();
  });

  it('reads coordinator options from configuration', () => {
    expect(module.get(CALL_COORDINATOR_OPTIONS)).toEqual({
      ringTimeoutMs: 20_000,
      connectTimeoutMs: 30_000,
      endGraceMs: 500,
    });
  });

  it('connects a call between two users through the relay', async () => {
    const incoming = firstValueFrom(bob.incomingCall$);

    expect(await alice.startCall('bob', 'video')).toBe(true);
    const call = await incoming;
    expect(call).toEqual({
      callId: alice.currentCallId,
      callerId: 'alice',
      callType: 'video',
    });
    expect(bob.callState).toBe('ringing');

    const candidate = {
      candidate: 'candidate:1 1 udp 2122260223 192.0.2.10 54400 typ host',
      sdpMid: '0',
      sdpMLineIndex: 0,
    };
    alicePeers.last.emitCandidate(candidate);
    await flush();

    expect(await bob.answerCall(call.callId)).toBe(true);
    await flush();

    expect(bobPeers.last.candidates).toEqual([candidate]);
    expect(alicePeers.last.appliedAnswers).toEqual([
      { type: 'answer', sdp: 'answer-sdp-video' },
    ]);
    expect(registry.getCall(call.callId)?.status).toBe('connected');

    alicePeers.last.connect();
    bobPeers.last.connect();
    expect(alice.callState).toBe('connected');
    expect(bob.callState).toBe('connected');

    const ended = firstValueFrom(bob.callEnded$);
    await alice.endCall();
    await flush();

    expect(await ended).toEqual<CallEndedEvent>({
      callId: call.callId,
      reason: 'ended',
      remote: true,
    });
    expect(bob.callState).toBe('ended');
    expect(aliceMedia.released).toHaveLength(1);
    expect(bobMedia.released).toHaveLength(1);
    expect(registry.getCall(call.callId)?.status).toBe('ended');
  });

  it('tells the caller when the callee declines', async () => {
    const incoming = firstValueFrom(bob.incomingCall$);
    await alice.startCall('bob', 'audio');
    await incoming;

    const ended = firstValueFrom(alice.callEnded$);
    await bob.declineCall();
    await flush();

    expect((await ended).reason).toBe('declined');
    expect(alice.callState).toBe('ended');
  });

  it('ends the call when the callee is not connected', async () => {
    const ended = firstValueFrom(alice.callEnded$);

    await alice.startCall('carol', 'audio');
    await flush();

    expect(await ended).toMatchObject({ reason: 'unavailable', remote: true });
    expect(aliceMedia.released).toHaveLength(1);
  });
});

describe('callCoordinatorOptionsFactory', () => {
  it('converts string settings to milliseconds', () => {
    const options = callCoordinatorOptionsFactory(
      new ConfigService({
        CALL_RING_TIMEOUT_SECONDS: '10',
        CALL_CONNECT_TIMEOUT_SECONDS: '15',
        CALL_END_GRACE_MS: '250',
      }),
    );

    expect(options).toEqual({
      ringTimeoutMs: 10_000,
      connectTimeoutMs: 15_000,
      endGraceMs: 250,
    });
  });

  it('falls back to defaults for values that are not valid durations', () => {
    const options = callCoordinatorOptionsFactory(
      new ConfigService({
        CALL_RING_TIMEOUT_SECONDS: 'soon',
        CALL_CONNECT_TIMEOUT_SECONDS: '-5',
        CALL_END_GRACE_MS: '0',
      }),
    );

    expect(options).toEqual({
      ringTimeoutMs: 45_000,
      connectTimeoutMs: 30_000,
      endGraceMs: 0,
    });
  });
});

describe('readConfigNumber', () => {
  it('uses the fallback when the key is unset or empty', () => {
    const configService = new ConfigService({ CALL_RECORD_TTL_SECONDS: '' });

    expect(readConfigNumber(configService, 'CALL_RECORD_TTL_SECONDS', 60)).toBe(
      60,
    );
    expect(readConfigNumber(configService, 'MISSING_KEY', 5)).toBe(5);
  });
});
