import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readConfigNumber } from '../../calls/calls.config';
import { CallRecord } from '../entities/call-record.entity';
import {
  CallSignal,
  HangupSignal,
  OfferSignal,
} from '../schemas/call-signal.schema';

@Injectable()
export class CallRegistryService implements OnModuleInit, OnModuleDestroy {
  private readonly calls = new Map<string, CallRecord>();
  private readonly logger = new Logger(CallRegistryService.name);
  private cleanUpInterval: NodeJS.Timeout | null = null;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    const intervalSeconds = readConfigNumber(
      this.configService,
      'CALL_RECORD_CLEANUP_INTERVAL_SECONDS',
      60,
    );
    // Periodically drop expired call records
    this.cleanUpInterval = setInterval(
      () => this.cleanupExpiredCalls(),
      intervalSeconds * 1000,
    );
  }

  onModuleDestroy() {
    if (this.cleanUpInterval) {
      clearInterval(this.cleanUpInterval);
      this.cleanUpInterval = null;
    }
  }

  /**
   * Keeps the call record in step with a relayed signal. Returns the record
   * the signal belongs to, if any.
   */
  recordSignal(signal: CallSignal): CallRecord | undefined {
    switch (signal.type) {
      case 'offer':
        return this.createCall(signal);
      case 'answer':
        return this.markConnected(signal.callId);
      case 'hangup':
        return this.markEnded(signal.callId, signal);
      case 'candidate':
        return this.getCall(signal.callId);
    }
  }

  getCall(callId: string): CallRecord | undefined {
    const call = this.calls.get(callId);
    if (call?.isExpired) {
      this.calls.delete(callId);
      return undefined;
    }
    return call;
  }

  getActiveCalls(): CallRecord[] {
    return Array.from(this.calls.values()).filter((call) => call.isActive);
  }

  getCallsForUser(userId: string): CallRecord[] {
    return this.getActiveCalls().filter((call) => call.involves(userId));
  }

  deleteCall(callId: string): boolean {
    return this.calls.delete(callId);
  }

  private createCall(signal: OfferSignal): CallRecord {
    const { callId, from: callerId, to: calleeId } = signal;
    const existing = this.getCall(callId);
    if (existing) {
      return existing;
    }
    const ttlSeconds = readConfigNumber(
      this.configService,
      'CALL_RECORD_TTL_SECONDS',
      3600,
    );
    const call = new CallRecord(
      callId,
      callerId,
      calleeId,
      signal.callType,
      ttlSeconds,
    );
    this.calls.set(callId, call);
    this.logger.log(
      `[${callId}] ${signal.callType} call ringing: ${callerId} -> ${calleeId}`,
    );
    return call;
  }

  private markConnected(callId: string): CallRecord | undefined {
    const call = this.getCall(callId);
    if (!call || call.status !== 'ringing') {
      return call;
    }
    call.status = 'connected';
    call.answeredAt = new Date();
    this.logger.log(`[${callId}] Call connected`);
    return call;
  }

  private markEnded(
    callId: string,
    signal: HangupSignal,
  ): CallRecord | undefined {
    const call = this.getCall(callId);
    if (!call || call.status === 'ended') {
      return call;
    }
    call.status = 'ended';
    call.endedAt = new Date();
    call.endReason = signal.reason;
    this.logger.log(
      `[${callId}] Call ended by ${signal.from} (${signal.reason})`,
    );
    return call;
  }

  private cleanupExpiredCalls(): void {
    let expiredCount = 0;

    for (const [callId, call] of this.calls.entries()) {
      if (call.isExpired) {
        this.calls.delete(callId);
        expiredCount++;
      }
    }
    if (expiredCount > 0) {
      this.logger.log(`Removed ${expiredCount} expired call records`);
    }
  }
}
