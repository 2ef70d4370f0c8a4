import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SignalingGateway, SignalingSocket } from './signaling.gateway';
import { SignalingRelayService } from './services/signaling-relay.service';
import { CallRegistryService } from './services/call-registry.service';

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function createSocket(id: string) {
  const emit = jest.fn();
  const socket: SignalingSocket = { id, emit };
  return { socket, emit };
}

describe('SignalingGateway', () => {
  let module: TestingModule;
  let gateway: SignalingGateway;
  let relay: SignalingRelayService;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      providers: [
        SignalingGateway,
        SignalingRelayService,
        CallRegistryService,
        { provide: ConfigService, useValue: new ConfigService() },
      ],
    }).compile();
    await module.init();

    gateway = module.get<SignalingGateway>(SignalingGateway);
    relay = module.get<SignalingRelayService>(SignalingRelayService);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should be defined', () => {
    expect(gateway).toBeDefined();
  });

  it('rejects a registration without a user id', () => {
    const { socket } = createSocket('socket-1');

    const ack = gateway.handleRegister(socket, { userId: '' });

    expect(ack).toEqual({ ok: false, error: 'userId should not be empty' });
    expect(relay.isOnline('')).toBe(false);
  });

  it('forwards relayed signals to the registered socket', async () => {
    const { socket, emit } = createSocket('socket-1');
    expect(gateway.handleRegister(socket, { userId: 'bob' })).toEqual({
      ok: true,
    });

    const alice = relay.connect('alice');
    await alice.sendSignal({
      type: 'offer',
      callId: 'call-1',
      from: 'alice',
      to: 'bob',
      callType: 'audio',
      sdp: 'v=0',
    });
    await flush();

    expect(emit).toHaveBeenCalledWith('signal', {
      type: 'offer',
      callId: 'call-1',
      from: 'alice',
      to: 'bob',
      callType: 'audio',
      sdp: 'v=0',
    });
  });

  it('relays client signals as the registered user', async () => {
    const { socket } = createSocket('socket-1');
    gateway.handleRegister(socket, { userId: 'alice' });
    const bob = relay.connect('bob');
    const received: unknown[] = [];
    bob.onSignal((signal) => received.push(signal));

    const ack = gateway.handleSignal(socket, {
      type: 'hangup',
      callId: 'call-1',
      from: 'someone-else',
      to: 'bob',
      reason: 'ended',
    });
    await flush();

    expect(ack).toEqual({ ok: true });
    expect(received).toEqual([
      {
        type: 'hangup',
        callId: 'call-1',
        from: 'alice',
        to: 'bob',
        reason: 'ended',
      },
    ]);
  });

  it('requires registration before signals', () => {
    const { socket } = createSocket('socket-1');

    expect(gateway.handleSignal(socket, { type: 'hangup' })).toEqual({
      ok: false,
      error: 'Register before sending signals',
    });
  });

  it('rejects non-object and invalid signals', () => {
    const { socket } = createSocket('socket-1');
    gateway.handleRegister(socket, { userId: 'alice' });

    expect(gateway.handleSignal(socket, 'offer')).toEqual({
      ok: false,
      error: 'Signal must be an object',
    });
    expect(
      gateway.handleSignal(socket, {
        type: 'answer',
        callId: 'call-1',
        to: 'bob',
      }),
    ).toEqual({
      ok: false,
      error: 'Invalid signal: sdp: Required',
    });
  });

  it('takes the user offline when the socket disconnects', () => {
    const { socket } = createSocket('socket-1');
    gateway.handleRegister(socket, { userId: 'alice' });
    expect(relay.isOnline('alice')).toBe(true);

    gateway.handleDisconnect(socket);

    expect(relay.isOnline('alice')).toBe(false);
  });

  it('replaces the endpoint when a socket registers again', () => {
    const { socket } = createSocket('socket-1');
    gateway.handleRegister(socket, { userId: 'alice' });

    gateway.handleRegister(socket, { userId: 'alice-2' });

    expect(relay.isOnline('alice')).toBe(false);
    expect(relay.isOnline('alice-2')).toBe(true);
  });
});
