/**
 * Application-facing entry point to the native layer.
 *
 * Two calling conventions:
 *   - request(): the transport resolves with the reply envelope directly.
 *   - requestWithAsyncResponse(): the outbound path carries a fresh
 *     `request-id`; the reply arrives later through deliver() as a correlated
 *     response envelope.
 *
 * Every outstanding request is tracked so terminate() can fail it. Timeouts and
 * abort signals remove the pending entry before rejecting; a response that
 * arrives afterwards is an anomaly, not a second settlement.
 */

import { parseBridgePath, withQuery } from "../bridge/path.js";
import { DEFAULT_CONFIG } from "../config.js";
import { TetherError, describeThrown } from "../errors.js";
import { type Logger, SILENT_LOGGER } from "../logger.js";
import {
  type CorrelatedReply,
  decodeCorrelatedReply,
  decodeReply,
  unwrapReply,
} from "../payload/envelope.js";
import { EMPTY_PAYLOAD, type Payload } from "../payload/payload.js";

/**
 * The concrete byte transport to the native side.
 */
export type PlatformTransport = Readonly<{
  /**
   * Deliver a request whose reply envelope the native side returns directly.
   * `signal` aborts once the caller stopped waiting (timeout, cancellation or
   * termination); the transport should forget the call.
   */
  call: (path: string, payload: string | null, signal: AbortSignal) => Promise<string>;
  /** Deliver a request whose reply comes back later through deliver(). */
  send: (path: string, payload: string | null) => void;
}>;

export type RequestOptions = Readonly<{
  /** Overrides the client's default; 0 disables the bound. */
  timeoutMs?: number;
  signal?: AbortSignal;
}>;

export type PlatformClientOptions = Readonly<{
  transport: PlatformTransport;
  timeoutMs?: number;
  logger?: Logger;
}>;

export type PlatformClientStats = Readonly<{
  anomalies: number;
  timeouts: number;
}>;

export type PlatformClient = Readonly<{
  request: (path: string, payload?: Payload, opts?: RequestOptions) => Promise<Payload>;
  requestWithAsyncResponse: (
    path: string,
    payload?: Payload,
    opts?: RequestOptions,
  ) => Promise<Payload>;
  /** Route a correlated response. Returns false for anomalies. */
  deliver: (rawResponse: string) => boolean;
  /** Fail every outstanding request and refuse new ones. Idempotent. */
  terminate: (reason?: Error) => void;
  isTerminated: () => boolean;
  /** Number of outstanding requests of either kind. */
  pendingCount: () => number;
  stats: () => PlatformClientStats;
}>;

type Pending = {
  path: string;
  resolve: (payload: Payload) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
  detachAbort: (() => void) | null;
  /** Tells the transport the caller gave up. */
  abandon: (() => void) | null;
};

export function createPlatformClient(opts: PlatformClientOptions): PlatformClient {
  const transport = opts.transport;
  const logger = opts.logger ?? SILENT_LOGGER;
  const defaultTimeoutMs = opts.timeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs;
  if (!Number.isInteger(defaultTimeoutMs) || defaultTimeoutMs < 0) {
    throw new TetherError(
      "TETHER_INVALID_PROPS",
      `request timeout must be a non-negative integer, got ${String(defaultTimeoutMs)}`,
    );
  }

  // Correlated requests are keyed by their wire id; direct calls use a
  // separate key space so ids stay dense.
  const pendingResponses = new Map<string, Pending>();
  const inFlightCalls = new Map<number, Pending>();
  let nextRequestId = 1;
  let nextCallId = 1;
  let terminal: Error | null = null;
  let anomalies = 0;
  let timeouts = 0;

  function settle(entry: Pending): void {
    if (entry.timer !== null) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
    if (entry.detachAbort !== null) {
      entry.detachAbort();
      entry.detachAbort = null;
    }
  }

  function anomaly(message: string, fields: Readonly<Record<string, unknown>>): false {
    anomalies++;
    logger.warn(message, fields);
    return false;
  }

  /**
   * Register an outstanding request in `table` and arm its timeout and abort
   * handling.
   */
  function track<K>(
    table: Map<K, Pending>,
    key: K,
    path: string,
    ropts: RequestOptions | undefined,
    abandon: (() => void) | null = null,
  ): Promise<Payload> {
    const timeoutMs = ropts?.timeoutMs ?? defaultTimeoutMs;
    const signal = ropts?.signal;

    return new Promise<Payload>((resolve, reject) => {
      const entry: Pending = { path, resolve, reject, timer: null, detachAbort: null, abandon };

      const fail = (err: Error): void => {
        if (table.get(key) !== entry) return;
        table.delete(key);
        settle(entry);
        reject(err);
        entry.abandon?.();
      };

      if (timeoutMs > 0) {
        entry.timer = setTimeout(() => {
          timeouts++;
          logger.warn("native request timed out", { path, timeoutMs });
          fail(
            new TetherError(
              "TETHER_TIMEOUT",
              `request ${path} timed out after ${String(timeoutMs)}ms`,
            ),
          );
        }, timeoutMs);
      }

      if (signal !== undefined) {
        const onAbort = (): void => {
          fail(new TetherError("TETHER_CANCELLED", `request ${path} was cancelled`));
        };
        signal.addEventListener("abort", onAbort, { once: true });
        entry.detachAbort = () => signal.removeEventListener("abort", onAbort);
      }

      table.set(key, entry);
    });
  }

  function preflight(path: string, ropts: RequestOptions | undefined): void {
    if (terminal !== null) throw terminal;
    parseBridgePath(path);
    if (ropts?.signal?.aborted === true) {
      throw new TetherError("TETHER_CANCELLED", `request ${path} was cancelled`);
    }
  }

  function complete<K>(table: Map<K, Pending>, key: K, outcome: () => Payload): boolean {
    const entry = table.get(key);
    if (entry === undefined) return false;
    table.delete(key);
    settle(entry);
    let payload: Payload;
    try {
      payload = outcome();
    } catch (err: unknown) {
      entry.reject(err instanceof Error ? err : new Error(describeThrown(err)));
      return true;
    }
    entry.resolve(payload);
    return true;
  }

  return Object.freeze({
    async request(
      path: string,
      payload: Payload = EMPTY_PAYLOAD,
      ropts?: RequestOptions,
    ): Promise<Payload> {
      preflight(path, ropts);
      const callId = nextCallId++;
      const abandoned = new AbortController();
      const result = track(inFlightCalls, callId, path, ropts, () => abandoned.abort());

      const failCall = (err: unknown): void => {
        complete(inFlightCalls, callId, () => {
          throw err;
        });
      };
      try {
        void transport.call(path, payload.raw, abandoned.signal).then((raw) => {
          complete(inFlightCalls, callId, () => unwrapReply(decodeReply(raw)));
        }, failCall);
      } catch (err: unknown) {
        failCall(err);
      }
      return result;
    },

    async requestWithAsyncResponse(
      path: string,
      payload: Payload = EMPTY_PAYLOAD,
      ropts?: RequestOptions,
    ): Promise<Payload> {
      preflight(path, ropts);
      const id = String(nextRequestId++);
      const outbound = withQuery(path, { "request-id": id });
      const result = track(pendingResponses, id, path, ropts);

      try {
        transport.send(outbound, payload.raw);
      } catch (err: unknown) {
        complete(pendingResponses, id, () => {
          throw err;
        });
      }
      return result;
    },

    deliver(rawResponse: string): boolean {
      let response: CorrelatedReply;
      try {
        response = decodeCorrelatedReply(rawResponse);
      } catch (err: unknown) {
        return anomaly("malformed correlated response", { error: describeThrown(err) });
      }
      const { id, result } = response;
      const delivered = complete(pendingResponses, id, () => unwrapReply(result));
      if (!delivered) {
        return anomaly("response for unknown request id", { id });
      }
      return true;
    },

    terminate(reason?: Error): void {
      if (terminal !== null) return;
      terminal =
        reason ?? new TetherError("TETHER_TRANSPORT_TERMINAL", "native transport terminated");

      const outstanding = [...pendingResponses.values(), ...inFlightCalls.values()];
      pendingResponses.clear();
      inFlightCalls.clear();
      for (const entry of outstanding) {
        settle(entry);
        entry.reject(terminal);
        entry.abandon?.();
      }
      if (outstanding.length > 0) {
        logger.info("platform client terminated with outstanding requests", {
          count: outstanding.length,
        });
      }
    },

    isTerminated: () => terminal !== null,
    pendingCount: () => pendingResponses.size + inFlightCalls.size,
    stats: () => Object.freeze({ anomalies, timeouts }),
  });
}
