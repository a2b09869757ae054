/**
 * Application-side bridge: path → handler registry and the native-facing
 * entry points.
 *
 * Handlers never run on the caller's stack. `dispatch` and `post` both enqueue
 * the handler on the dispatch queue; `dispatch` additionally waits for it so
 * the native caller gets the handler's reply.
 */

import type { DispatchQueue } from "../dispatch/dispatchQueue.js";
import { TetherError, describeThrown, isTetherError } from "../errors.js";
import { type Logger, SILENT_LOGGER } from "../logger.js";
import { encodeErrorReply, encodeReply } from "../payload/envelope.js";
import { EMPTY_PAYLOAD, type Payload, parsePayload } from "../payload/payload.js";
import { type BridgePath, normalizeHandlerPath, parseBridgePath } from "./path.js";

export type HandlerResult = Payload | undefined | void;

/**
 * A bridge handler. `url` is the full origin URL, query included.
 */
export type BridgeHandler = (url: URL, payload: Payload) => HandlerResult | Promise<HandlerResult>;

export type AppBridgeOptions = Readonly<{
  queue: DispatchQueue;
  logger?: Logger;
}>;

export type AppBridge = Readonly<{
  /** Register `handler` under `path`. Registering a path twice throws. */
  handle: (path: string, handler: BridgeHandler) => void;
  has: (path: string) => boolean;
  paths: () => readonly string[];
  /**
   * Run the handler for `rawPath` on the dispatch queue and resolve with its
   * reply envelope. Never rejects: failures become error envelopes.
   */
  dispatch: (rawPath: string, rawPayload: string | null) => Promise<string>;
  /**
   * Enqueue the handler for `rawPath` and return an acknowledgement envelope
   * right away, or an error envelope if it could not be enqueued.
   */
  post: (rawPath: string, rawPayload: string | null) => string;
}>;

type Resolved = Readonly<{
  target: BridgePath;
  handler: BridgeHandler;
  payload: Payload;
}>;

export function createAppBridge(opts: AppBridgeOptions): AppBridge {
  const queue = opts.queue;
  const logger = opts.logger ?? SILENT_LOGGER;
  const handlers = new Map<string, BridgeHandler>();

  function resolve(rawPath: string, rawPayload: string | null): Resolved {
    const target = parseBridgePath(rawPath);
    const handler = handlers.get(target.path);
    if (handler === undefined) {
      logger.warn("no handler for bridge path", { path: target.path });
      throw new TetherError("TETHER_NOT_FOUND", `no handler registered for ${target.path}`);
    }
    return Object.freeze({ target, handler, payload: parsePayload(rawPayload) });
  }

  async function invoke(resolved: Resolved): Promise<Payload> {
    const out = await resolved.handler(resolved.target.url, resolved.payload);
    return out ?? EMPTY_PAYLOAD;
  }

  return Object.freeze({
    handle(path: string, handler: BridgeHandler): void {
      const key = normalizeHandlerPath(path);
      if (handlers.has(key)) {
        throw new TetherError("TETHER_DUPLICATE_PATH", `a handler is already registered for ${key}`);
      }
      handlers.set(key, handler);
    },

    has(path: string): boolean {
      let key: string;
      try {
        key = normalizeHandlerPath(path);
      } catch (err: unknown) {
        if (isTetherError(err, "TETHER_INVALID_PATH")) return false;
        throw err;
      }
      return handlers.has(key);
    },

    paths(): readonly string[] {
      return Object.freeze(Array.from(handlers.keys()).sort());
    },

    async dispatch(rawPath: string, rawPayload: string | null): Promise<string> {
      let resolved: Resolved;
      try {
        resolved = resolve(rawPath, rawPayload);
      } catch (err: unknown) {
        return encodeErrorReply(err);
      }

      try {
        const result = await queue.call(() => invoke(resolved), resolved.target.path);
        return encodeReply(result);
      } catch (err: unknown) {
        logger.trace("dispatch replied with error", {
          path: resolved.target.path,
          error: describeThrown(err),
        });
        return encodeErrorReply(err);
      }
    },

    post(rawPath: string, rawPayload: string | null): string {
      try {
        const resolved = resolve(rawPath, rawPayload);
        queue.post(() => invoke(resolved), resolved.target.path);
        return encodeReply();
      } catch (err: unknown) {
        return encodeErrorReply(err);
      }
    },
  });
}
