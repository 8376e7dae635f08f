import { z } from 'zod';

/**
 * Zod schemas for inbound protocol envelopes.
 *
 * Each `type` has exactly one payload shape; anything that does not match
 * is rejected at decode time, before dispatch.
 */

// Unknown ids, including the empty string, are answered with GAME_NOT_FOUND.
const GameIdSchema = z.string();

export const JoinPayloadSchema = z.object({}).passthrough();

export const MovePayloadSchema = z.object({
  gameId: GameIdSchema,
  // Legality, including blank or oversized text, is the rules engine's call.
  move: z.string(),
});

export const GameRefPayloadSchema = z.object({
  gameId: GameIdSchema,
});

export const DrawResponsePayloadSchema = z.object({
  gameId: GameIdSchema,
  accept: z.boolean(),
});

export const TimeUpdatePayloadSchema = z.object({
  gameId: GameIdSchema,
  timeLeft: z.number().finite(),
});

export const ChatPayloadSchema = z.object({
  gameId: GameIdSchema,
  message: z.string().max(500, 'Message must be at most 500 characters'),
});

export const PingPayloadSchema = z.object({}).passthrough();

// `payload` may be omitted for join and ping.
const emptyPayload = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => value ?? {}, schema);

export const ClientEnvelopeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('join'), payload: emptyPayload(JoinPayloadSchema) }),
  z.object({ type: z.literal('move'), payload: MovePayloadSchema }),
  z.object({ type: z.literal('resign'), payload: GameRefPayloadSchema }),
  z.object({ type: z.literal('draw_offer'), payload: GameRefPayloadSchema }),
  z.object({ type: z.literal('draw_response'), payload: DrawResponsePayloadSchema }),
  z.object({ type: z.literal('time_update'), payload: TimeUpdatePayloadSchema }),
  z.object({ type: z.literal('chat'), payload: ChatPayloadSchema }),
  z.object({ type: z.literal('reconnect'), payload: GameRefPayloadSchema }),
  z.object({ type: z.literal('ping'), payload: emptyPayload(PingPayloadSchema) }),
]);

export type ClientEnvelope = z.infer<typeof ClientEnvelopeSchema>;

export type DecodeResult =
  | { ok: true; envelope: ClientEnvelope }
  | { ok: false; reason: string; type?: string };

/**
 * Decode a raw frame into a validated envelope. Accepts either an already
 * parsed object or a JSON string.
 */
export function decodeEnvelope(raw: unknown): DecodeResult {
  let candidate: unknown = raw;
  if (typeof raw === 'string') {
    try {
      candidate = JSON.parse(raw);
    } catch {
      return { ok: false, reason: 'Malformed JSON' };
    }
  }

  const result = ClientEnvelopeSchema.safeParse(candidate);
  if (!result.success) {
    const type =
      typeof candidate === 'object' && candidate !== null && 'type' in candidate
        ? String(candidate.type)
        : undefined;
    const reason = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'envelope'}: ${issue.message}`)
      .join('; ');
    return { ok: false, reason, type };
  }

  return { ok: true, envelope: result.data };
}
