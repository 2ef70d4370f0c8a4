import { z } from 'zod';

/**
 * Call signaling messages. Every signal names the call it belongs to and
 * both parties; the relay routes on `to`.
 */

const baseSignalSchema = z.object({
  callId: z.string().min(1, 'callId is required'),
  from: z.string().min(1, 'from is required'),
  to: z.string().min(1, 'to is required'),
});

export const offerSignalSchema = baseSignalSchema.extend({
  type: z.literal('offer'),
  callType: z.enum(['audio', 'video']),
  sdp: z.string().min(1, 'sdp is required'),
});

export const answerSignalSchema = baseSignalSchema.extend({
  type: z.literal('answer'),
  sdp: z.string().min(1, 'sdp is required'),
});

export const iceCandidateSchema = z.object({
  candidate: z.string().min(1, 'candidate is required'),
  sdpMid: z.string().nullable(),
  sdpMLineIndex: z.number().int().nonnegative().nullable(),
});

export const candidateSignalSchema = baseSignalSchema.extend({
  type: z.literal('candidate'),
  candidate: iceCandidateSchema,
});

export const hangupSignalSchema = baseSignalSchema.extend({
  type: z.literal('hangup'),
  reason: z.enum([
    'ended',
    'declined',
    'busy',
    'timeout',
    'unavailable',
    'error',
  ]),
});

export const callSignalSchema = z.discriminatedUnion('type', [
  offerSignalSchema,
  answerSignalSchema,
  candidateSignalSchema,
  hangupSignalSchema,
]);

export type OfferSignal = z.infer<typeof offerSignalSchema>;
export type AnswerSignal = z.infer<typeof answerSignalSchema>;
export type CandidateSignal = z.infer<typeof candidateSignalSchema>;
export type HangupSignal = z.infer<typeof hangupSignalSchema>;
export type CallSignal = z.infer<typeof callSignalSchema>;

export type ParsedSignal =
  | { success: true; signal: CallSignal }
  | { success: false; error: string };

export function parseCallSignal(input: unknown): ParsedSignal {
  const result = callSignalSchema.safeParse(input);
  if (!result.success) {
    const error = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'signal'}: ${issue.message}`)
      .join('; ');
    return { success: false, error };
  }
  return { success: true, signal: result.data };
}
