import {
  DynamicModule,
  FactoryProvider,
  Module,
  ModuleMetadata,
} from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  AUDIO_ROUTING,
  CALL_COORDINATOR_OPTIONS,
  MEDIA_CAPTURE,
  PEER_TRANSPORT_FACTORY,
  SIGNALING_CHANNEL,
} from './calls.constants';
import { callCoordinatorOptionsFactory } from './calls.config';
import { AudioRouting, MediaCapture } from './interfaces/media-capture';
import { PeerTransportFactory } from './interfaces/peer-transport';
import { SignalingChannel } from './interfaces/signaling-channel';
import { CallSessionCoordinator } from './services/call-session-coordinator.service';

export interface CallsModuleOptions {
  imports?: ModuleMetadata['imports'];
  signaling: Omit<FactoryProvider<SignalingChannel>, 'provide'>;
  mediaCapture: MediaCapture;
  peerTransportFactory: PeerTransportFactory;
  // Platforms without audio routing leave the speaker flag UI-only
  audioRouting?: AudioRouting;
}

const NO_AUDIO_ROUTING: AudioRouting = {
  setSpeakerphoneOn: async () => undefined,
};

@Module({})
export class CallsModule {
  static forRoot(options: CallsModuleOptions): DynamicModule {
    return {
      module: CallsModule,
      imports: [ConfigModule, ...(options.imports ?? [])],
      providers: [
        { provide: SIGNALING_CHANNEL, ...options.signaling },
        { provide: MEDIA_CAPTURE, useValue: options.mediaCapture },
        {
          provide: PEER_TRANSPORT_FACTORY,
          useValue: options.peerTransportFactory,
        },
        {
          provide: AUDIO_ROUTING,
          useValue: options.audioRouting ?? NO_AUDIO_ROUTING,
        },
        {
          provide: CALL_COORDINATOR_OPTIONS,
          useFactory: callCoordinatorOptionsFactory,
          inject: [ConfigService],
        },
        CallSessionCoordinator,
      ],
      exports: [CallSessionCoordinator],
    };
  }
}
