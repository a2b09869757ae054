/**
 * Messages exchanged with the native host over a MessagePort.
 *
 * App → native:
 *   call      request with a direct reply (answered by callResult)
 *   send      request whose reply arrives later as a correlated response
 *   reply     reply envelope for an inbound dispatch
 *
 * Native → app:
 *   callResult  reply envelope for a call, matched by seq
 *   response    correlated response envelope for a send
 *   dispatch    invoke a handler and reply
 *   post        invoke a handler, no reply
 *
 * Payloads and replies travel as JSON text; the envelope inside is decoded by
 * @tether/core.
 */

import { z } from "zod";

const SeqSchema = z.number().int().nonnegative();
const PayloadTextSchema = z.string().nullable();

export const AppMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("call"), seq: SeqSchema, path: z.string(), payload: PayloadTextSchema }),
  z.object({ type: z.literal("send"), path: z.string(), payload: PayloadTextSchema }),
  z.object({ type: z.literal("reply"), seq: SeqSchema, reply: z.string() }),
]);

export const NativeMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("callResult"), seq: SeqSchema, reply: z.string() }),
  z.object({ type: z.literal("response"), response: z.string() }),
  z.object({
    type: z.literal("dispatch"),
    seq: SeqSchema,
    path: z.string(),
    payload: PayloadTextSchema,
  }),
  z.object({ type: z.literal("post"), path: z.string(), payload: PayloadTextSchema }),
]);

export type AppMessage = z.infer<typeof AppMessageSchema>;
export type NativeMessage = z.infer<typeof NativeMessageSchema>;
