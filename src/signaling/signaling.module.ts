import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CallsController } from './controllers/calls.controller';
import { CallRegistryService } from './services/call-registry.service';
import { SignalingRelayService } from './services/signaling-relay.service';
import { SignalingGateway } from './signaling.gateway';

@Module({
  imports: [ConfigModule],
  controllers: [CallsController],
  providers: [CallRegistryService, SignalingRelayService, SignalingGateway],
  exports: [CallRegistryService, SignalingRelayService],
})
export class SignalingModule {}
