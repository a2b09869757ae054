/**
 * Payload codec.
 *
 * A payload carries zero or one JSON value across the bridge. Encoding happens
 * eagerly so an unrepresentable value fails where it was produced, not on the
 * far side of the transport. Decoding goes through a caller-supplied zod
 * schema; a mismatch is a TETHER_DECODE_ERROR.
 */

import type { z } from "zod";
import { TetherError, describeThrown } from "../errors.js";

export type Payload = Readonly<{
  /** True when the payload carries no value. */
  isEmpty: boolean;
  /** JSON text of the value, or null when empty. */
  raw: string | null;
  /** The decoded JSON value (undefined when empty). */
  value: () => unknown;
  /** Validate the value against `schema` and return the parsed result. */
  decode: <S extends z.ZodTypeAny>(schema: S) => z.infer<S>;
}>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const at = issue.path.length === 0 ? "<root>" : issue.path.join(".");
      return `${at}: ${issue.message}`;
    })
    .join("; ");
}

function makePayload(raw: string | null, value: unknown): Payload {
  return Object.freeze({
    isEmpty: raw === null,
    raw,
    value: () => value,
    decode: <S extends z.ZodTypeAny>(schema: S): z.infer<S> => {
      const parsed = schema.safeParse(value);
      if (!parsed.success) {
        throw new TetherError(
          "TETHER_DECODE_ERROR",
          `payload does not match destination: ${formatIssues(parsed.error)}`,
          { cause: parsed.error },
        );
      }
      return parsed.data;
    },
  });
}

export const EMPTY_PAYLOAD: Payload = makePayload(null, undefined);

/**
 * Wrap a value in a payload. `undefined` yields the empty payload.
 */
export function createPayload(value?: unknown): Payload {
  if (value === undefined) return EMPTY_PAYLOAD;

  let raw: string | undefined;
  try {
    raw = JSON.stringify(value);
  } catch (err: unknown) {
    throw new TetherError(
      "TETHER_ENCODE_ERROR",
      `payload value cannot be encoded: ${describeThrown(err)}`,
      { cause: err },
    );
  }
  // JSON.stringify returns undefined for functions and symbols.
  if (raw === undefined) {
    throw new TetherError("TETHER_ENCODE_ERROR", `payload value of type ${typeof value} has no JSON form`);
  }
  return makePayload(raw, JSON.parse(raw));
}

/**
 * Parse payload text received from the transport.
 * `null`, `undefined` and the empty string are the empty payload.
 */
export function parsePayload(raw: string | null | undefined): Payload {
  if (raw === null || raw === undefined || raw.length === 0) return EMPTY_PAYLOAD;

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err: unknown) {
    throw new TetherError("TETHER_DECODE_ERROR", `payload is not valid JSON: ${describeThrown(err)}`, {
      cause: err,
    });
  }
  return makePayload(raw, value);
}
