import {
  Controller,
  Get,
  Logger,
  NotFoundException,
  Param,
} from '@nestjs/common';
import { CallRegistryService } from '../services/call-registry.service';
import { CallRecord } from '../entities/call-record.entity';

type CallRecordJson = ReturnType<CallRecord['toJSON']>;

@Controller('calls')
export class CallsController {
  private readonly logger = new Logger(CallsController.name);

  constructor(private readonly callRegistryService: CallRegistryService) {}

  @Get()
  getActiveCalls(): { success: boolean; data: CallRecordJson[] } {
    const calls = this.callRegistryService.getActiveCalls();
    return { success: true, data: calls.map((call) => call.toJSON()) };
  }

  @Get(':callId')
  getCall(@Param('callId') callId: string): {
    success: boolean;
    data: CallRecordJson;
  } {
    const call = this.callRegistryService.getCall(callId);
    if (!call) {
      this.logger.log(`Call not found: ${callId}`);
      throw new NotFoundException(`Call ${callId} not found`);
    }
    return { success: true, data: call.toJSON() };
  }
}
