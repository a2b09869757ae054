/**
 * Error type and codes for Tether.
 *
 * Every failure the bridge, queue, history, page or directory reports is a
 * TetherError. The `code` property is what callers and the wire protocol
 * branch on; messages are for humans.
 */

// =============================================================================
// TetherErrorCode
// =============================================================================

export const TETHER_ERROR_CODES = [
  "TETHER_NOT_FOUND",
  "TETHER_DECODE_ERROR",
  "TETHER_ENCODE_ERROR",
  "TETHER_PROTOCOL_ANOMALY",
  "TETHER_HANDLER_FAILURE",
  "TETHER_TRANSPORT_TERMINAL",
  "TETHER_SHUTDOWN",
  "TETHER_TIMEOUT",
  "TETHER_CANCELLED",
  "TETHER_QUEUE_FULL",
  "TETHER_DUPLICATE_PATH",
  "TETHER_INVALID_PATH",
  "TETHER_INVALID_PROPS",
  "TETHER_INVALID_STATE",
  "TETHER_MOUNT_FAILED",
  "TETHER_FATAL",
  "TETHER_REMOTE_ERROR",
] as const;

/**
 * Deterministic error codes for every runtime violation.
 */
export type TetherErrorCode = (typeof TETHER_ERROR_CODES)[number];

const KNOWN_CODES: ReadonlySet<string> = new Set(TETHER_ERROR_CODES);

export function isTetherErrorCode(code: string): code is TetherErrorCode {
  return KNOWN_CODES.has(code);
}

// =============================================================================
// TetherError
// =============================================================================

export type TetherErrorOptions = Readonly<{
  /** Underlying error this one wraps. */
  cause?: unknown;
}>;

/**
 * Error class for all Tether runtime failures.
 * The `code` property identifies the specific violation.
 */
export class TetherError extends Error {
  override readonly name = "TetherError";
  readonly code: TetherErrorCode;

  constructor(code: TetherErrorCode, message?: string, opts?: TetherErrorOptions) {
    super(message ?? code, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TetherError);
    }
  }
}

export function isTetherError(v: unknown, code?: TetherErrorCode): v is TetherError {
  if (!(v instanceof TetherError)) return false;
  return code === undefined || v.code === code;
}

/**
 * Render any thrown value as a single-line description.
 */
export function describeThrown(v: unknown): string {
  if (v instanceof TetherError) return `${v.code}: ${v.message}`;
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return String(v);
  } catch {
    return "[unprintable]";
  }
}

/**
 * Throw a fatal fault from inside a dispatch queue task.
 *
 * The queue converts it into a FatalReport and shuts down instead of moving
 * on to the next entry.
 */
export function raiseFatal(detail: string, cause?: unknown): never {
  throw new TetherError("TETHER_FATAL", detail, cause === undefined ? undefined : { cause });
}
