import { IsNotEmpty, IsString } from '@nestjs/class-validator';

export class RegisterPeerDto {
  @IsString()
  @IsNotEmpty()
  userId!: string;
}
