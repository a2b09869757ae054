/**
 * Reply envelopes.
 *
 * Shapes (JSON):
 *   {"ok":true}                                   empty reply
 *   {"ok":true,"payload":<value>}                 reply with a value
 *   {"ok":false,"error":{"code":..,"message":..}} failure
 *
 * Correlated responses to async requests carry an extra `"id"` field.
 */

import { z } from "zod";
import { TetherError, describeThrown, isTetherErrorCode } from "../errors.js";
import { EMPTY_PAYLOAD, type Payload, createPayload } from "./payload.js";

export const WireErrorSchema = z.object({
  code: z.string().min(1),
  message: z.string(),
});

export type WireError = z.infer<typeof WireErrorSchema>;

const OkReplySchema = z.object({
  ok: z.literal(true),
  payload: z.unknown().optional(),
});

const ErrorReplySchema = z.object({
  ok: z.literal(false),
  error: WireErrorSchema,
});

export const ReplyEnvelopeSchema = z.union([OkReplySchema, ErrorReplySchema]);

export const CorrelatedReplySchema = z.union([
  OkReplySchema.extend({ id: z.string().min(1) }),
  ErrorReplySchema.extend({ id: z.string().min(1) }),
]);

export type ReplyEnvelope = z.infer<typeof ReplyEnvelopeSchema>;

/**
 * Outcome of decoding a reply: the payload or the error it carried.
 */
export type ReplyResult =
  | Readonly<{ ok: true; payload: Payload }>
  | Readonly<{ ok: false; error: TetherError }>;

export type CorrelatedReply = Readonly<{ id: string; result: ReplyResult }>;

export function toWireError(err: unknown): WireError {
  if (err instanceof TetherError) return { code: err.code, message: err.message };
  return { code: "TETHER_HANDLER_FAILURE", message: describeThrown(err) };
}

/**
 * Turn a wire error back into a TetherError. Codes this side does not know
 * (native-specific ones) become TETHER_REMOTE_ERROR.
 */
export function fromWireError(wire: WireError): TetherError {
  if (isTetherErrorCode(wire.code)) return new TetherError(wire.code, wire.message);
  return new TetherError("TETHER_REMOTE_ERROR", `${wire.code}: ${wire.message}`);
}

function okBody(payload: Payload): string {
  return payload.raw === null ? `"ok":true` : `"ok":true,"payload":${payload.raw}`;
}

export function encodeReply(payload: Payload = EMPTY_PAYLOAD): string {
  return `{${okBody(payload)}}`;
}

export function encodeErrorReply(err: unknown): string {
  return JSON.stringify({ ok: false, error: toWireError(err) });
}

export function encodeCorrelatedReply(id: string, result: Payload | Error): string {
  if (result instanceof Error) {
    return JSON.stringify({ id, ok: false, error: toWireError(result) });
  }
  return `{"id":${JSON.stringify(id)},${okBody(result)}}`;
}

function parseJson(raw: string, what: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    throw new TetherError("TETHER_DECODE_ERROR", `${what} is not valid JSON: ${describeThrown(err)}`, {
      cause: err,
    });
  }
}

function toResult(envelope: ReplyEnvelope): ReplyResult {
  if (envelope.ok) {
    return Object.freeze({ ok: true, payload: createPayload(envelope.payload) });
  }
  return Object.freeze({ ok: false, error: fromWireError(envelope.error) });
}

/**
 * Decode a reply envelope. Throws TETHER_DECODE_ERROR when the text is not an
 * envelope; an error envelope is returned, not thrown.
 */
export function decodeReply(raw: string): ReplyResult {
  const parsed = ReplyEnvelopeSchema.safeParse(parseJson(raw, "reply"));
  if (!parsed.success) {
    throw new TetherError("TETHER_DECODE_ERROR", `malformed reply envelope: ${raw}`, {
      cause: parsed.error,
    });
  }
  return toResult(parsed.data);
}

export function decodeCorrelatedReply(raw: string): CorrelatedReply {
  const parsed = CorrelatedReplySchema.safeParse(parseJson(raw, "response"));
  if (!parsed.success) {
    throw new TetherError("TETHER_DECODE_ERROR", `malformed correlated response: ${raw}`, {
      cause: parsed.error,
    });
  }
  const { id } = parsed.data;
  return Object.freeze({ id, result: toResult(parsed.data) });
}

/**
 * Unwrap a reply into its payload, throwing the carried error.
 */
export function unwrapReply(result: ReplyResult): Payload {
  if (result.ok) return result.payload;
  throw result.error;
}
