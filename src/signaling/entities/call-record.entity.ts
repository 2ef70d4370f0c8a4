import { CallType, HangupReason } from '../../calls/types/call.types';

export type CallRecordStatus = 'ringing' | 'connected' | 'ended';

export class CallRecord {
  readonly callId: string;
  readonly callerId: string;
  readonly calleeId: string;
  readonly callType: CallType;
  status: CallRecordStatus = 'ringing';
  createdAt: Date;
  expiresAt: Date;
  answeredAt?: Date;
  endedAt?: Date;
  endReason?: HangupReason;

  // ttlSeconds is the time to live for the call record in seconds
  constructor(
    callId: string,
    callerId: string,
    calleeId: string,
    callType: CallType,
    ttlSeconds: number = 3600,
  ) {
    this.callId = callId;
    this.callerId = callerId;
    this.calleeId = calleeId;
    this.callType = callType;
    this.createdAt = new Date();
    this.expiresAt = new Date(this.createdAt.getTime() + ttlSeconds * 1000);
  }

  get isExpired(): boolean {
    return new Date() > this.expiresAt;
  }

  get isActive(): boolean {
    return this.status !== 'ended' && !this.isExpired;
  }

  involves(userId: string): boolean {
    return this.callerId === userId || this.calleeId === userId;
  }

  otherParty(userId: string): string {
    return this.callerId === userId ? this.calleeId : this.callerId;
  }

  toJSON() {
    return {
      callId: this.callId,
      callerId: this.callerId,
      calleeId: this.calleeId,
      callType: this.callType,
      status: this.status,
      createdAt: this.createdAt.toISOString(),
      answeredAt: this.answeredAt?.toISOString(),
      endedAt: this.endedAt?.toISOString(),
      endReason: this.endReason,
    };
  }
}
