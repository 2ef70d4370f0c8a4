import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import * as path from 'path';
import { SignalingModule } from './signaling/signaling.module';

@Module({
  imports: [
    SignalingModule,
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: process.env.ENV_FILE
        ? path.resolve(process.cwd(), process.env.ENV_FILE)
        : '.env',
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
