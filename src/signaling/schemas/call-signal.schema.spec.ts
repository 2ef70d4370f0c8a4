import { parseCallSignal } from './call-signal.schema';

describe('parseCallSignal', () => {
  it('accepts an offer', () => {
    const input = {
      type: 'offer',
      callId: 'call-1',
      from: 'alice',
      to: 'bob',
      callType: 'video',
      sdp: 'v=0',
    };

    expect(parseCallSignal(input)).toEqual({ success: true, signal: input });
  });

  it('accepts a candidate with null sdpMid and line index', () => {
    const result = parseCallSignal({
      type: 'candidate',
      callId: 'call-1',
      from: 'alice',
      to: 'bob',
      candidate: { candidate: 'candidate:1', sdpMid: null, sdpMLineIndex: null },
    });

    expect(result.success).toBe(true);
  });

  it('strips unknown fields', () => {
    const result = parseCallSignal({
      type: 'answer',
      callId: 'call-1',
      from: 'bob',
      to: 'alice',
      sdp: 'v=0',
      extra: true,
    });

    expect(result).toEqual({
      success: true,
      signal: {
        type: 'answer',
        callId: 'call-1',
        from: 'bob',
        to: 'alice',
        sdp: 'v=0',
      },
    });
  });

  it('reports missing fields with their path', () => {
    const result = parseCallSignal({
      type: 'hangup',
      callId: '',
      from: 'alice',
      to: 'bob',
      reason: 'ended',
    });

    expect(result).toEqual({
      success: false,
      error: 'callId: callId is required',
    });
  });

  it('rejects an unknown hangup reason', () => {
    const result = parseCallSignal({
      type: 'hangup',
      callId: 'call-1',
      from: 'alice',
      to: 'bob',
      reason: 'bored',
    });

    expect(result.success).toBe(false);
  });

  it('rejects an unknown signal type', () => {
    const result = parseCallSignal({
      type: 'renegotiate',
      callId: 'call-1',
      from: 'alice',
      to: 'bob',
    });

    expect(result.success).toBe(false);
  });
});
