/**
 * Upstream envelope decoding.
 *
 * Classifies a `generateContent` response body into exactly one
 * {@link UpstreamResult} variant before anything branches on it.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

const SafetyRatingsSchema = z.array(z.unknown());

const PartSchema = z
  .object({
    text: z.string().optional(),
    functionCall: z.unknown().optional(),
  })
  .passthrough();

const CandidateSchema = z
  .object({
    content: z
      .object({
        parts: z.array(PartSchema).optional(),
      })
      .passthrough()
      .optional(),
    finishReason: z.string().optional(),
    safetyRatings: SafetyRatingsSchema.optional(),
  })
  .passthrough();

const PromptFeedbackSchema = z
  .object({
    blockReason: z.string().optional(),
    safetyRatings: SafetyRatingsSchema.optional(),
  })
  .passthrough();

const EnvelopeSchema = z
  .object({
    candidates: z.array(CandidateSchema).optional(),
    promptFeedback: PromptFeedbackSchema.optional(),
  })
  .passthrough();

export const SAFETY_FINISH_REASON = 'SAFETY';

export interface TextReply {
  kind: 'text';
  text: string;
  finishReason: string;
  safetyRatings?: unknown[];
}

export interface FunctionCallReply {
  kind: 'function_call';
  functionCall: unknown;
  finishReason: string;
}

export interface SafetyBlockedReply {
  kind: 'safety_blocked';
  safetyRatings: unknown[];
}

export interface EmptyReply {
  kind: 'empty';
  finishReason: string;
}

export interface PromptBlocked {
  kind: 'prompt_blocked';
  blockReason: string;
  safetyRatings?: unknown[];
}

export interface MalformedShape {
  kind: 'malformed';
  reason: string;
  payload: unknown;
}

export type UpstreamResult =
  | TextReply
  | FunctionCallReply
  | SafetyBlockedReply
  | EmptyReply
  | PromptBlocked
  | MalformedShape;

/**
 * Decode a parsed response body. Never throws.
 */
export function decodeEnvelope(payload: unknown): UpstreamResult {
  const parsed = EnvelopeSchema.safeParse(payload);
  if (!parsed.success) {
    return { kind: 'malformed', reason: 'Unexpected response structure from Gemini', payload };
  }
  const envelope = parsed.data;

  const candidate = envelope.candidates?.[0];
  if (candidate) {
    const finishReason = candidate.finishReason ?? 'UNKNOWN';
    const safetyBlocked = finishReason === SAFETY_FINISH_REASON;
    const part = candidate.content?.parts?.[0];

    if (!part) {
      // Fully blocked candidates come back without content
      if (safetyBlocked) {
        return { kind: 'safety_blocked', safetyRatings: candidate.safetyRatings ?? [] };
      }
      return {
        kind: 'malformed',
        reason: 'Invalid response structure from Gemini: Missing content or parts',
        payload,
      };
    }

    if (part.text) {
      return safetyBlocked
        ? { kind: 'text', text: part.text, finishReason, safetyRatings: candidate.safetyRatings ?? [] }
        : { kind: 'text', text: part.text, finishReason };
    }
    if (safetyBlocked) {
      return { kind: 'safety_blocked', safetyRatings: candidate.safetyRatings ?? [] };
    }
    if (part.functionCall !== undefined) {
      return { kind: 'function_call', functionCall: part.functionCall, finishReason };
    }
    return { kind: 'empty', finishReason };
  }

  const blockReason = envelope.promptFeedback?.blockReason;
  if (blockReason !== undefined) {
    const safetyRatings = envelope.promptFeedback?.safetyRatings;
    return safetyRatings === undefined
      ? { kind: 'prompt_blocked', blockReason }
      : { kind: 'prompt_blocked', blockReason, safetyRatings };
  }

  return { kind: 'malformed', reason: 'Unexpected response structure from Gemini', payload };
}
