/**
 * Native link over a worker_threads MessagePort.
 *
 * Outbound: implements PlatformTransport. Direct calls are correlated by a
 * per-link sequence number and settled by `callResult` messages. A call whose
 * caller gave up is forgotten, so a late `callResult` for it is an anomaly.
 *
 * Inbound: `dispatch` and `post` go to the attached AppBridge, `response` to
 * the attached PlatformClient. Messages that fail validation are logged and
 * dropped.
 *
 * When the port closes every in-flight call fails with
 * TETHER_TRANSPORT_TERMINAL and the attached platform client is terminated.
 */

import type { MessagePort } from "node:worker_threads";
import {
  type AppBridge,
  type Logger,
  type PlatformClient,
  type PlatformTransport,
  SILENT_LOGGER,
  TetherError,
  describeThrown,
  encodeErrorReply,
} from "@tether/core";
import { type AppMessage, type NativeMessage, NativeMessageSchema } from "./protocol.js";

export type MessagePortLinkOptions = Readonly<{
  logger?: Logger;
}>;

export type LinkTargets = Readonly<{
  bridge: AppBridge;
  platform: PlatformClient;
}>;

export type MessagePortLink = Readonly<{
  transport: PlatformTransport;
  /** Route inbound requests and responses. Call once, before the native side starts. */
  attach: (targets: LinkTargets) => void;
  /** Close the port. Idempotent. */
  close: () => void;
  isClosed: () => boolean;
}>;

type CallWaiter = Readonly<{
  resolve: (reply: string) => void;
  reject: (err: Error) => void;
  detach: () => void;
}>;

function terminalError(): TetherError {
  return new TetherError("TETHER_TRANSPORT_TERMINAL", "native port closed");
}

export function createMessagePortLink(
  port: MessagePort,
  opts: MessagePortLinkOptions = {},
): MessagePortLink {
  const logger = opts.logger ?? SILENT_LOGGER;
  const callWaiters = new Map<number, CallWaiter>();
  let nextSeq = 1;
  let targets: LinkTargets | null = null;
  let closed = false;

  function post(msg: AppMessage): void {
    port.postMessage(msg);
  }

  function failAll(err: Error): void {
    const waiters = Array.from(callWaiters.values());
    callWaiters.clear();
    for (const waiter of waiters) {
      waiter.detach();
      waiter.reject(err);
    }
  }

  function onClose(): void {
    if (closed) return;
    closed = true;
    port.off("message", onMessage);
    port.off("close", onClose);
    const err = terminalError();
    failAll(err);
    targets?.platform.terminate(err);
    logger.info("native port closed");
  }

  function handleDispatch(msg: Extract<NativeMessage, { type: "dispatch" }>): void {
    if (targets === null) {
      post({
        type: "reply",
        seq: msg.seq,
        reply: encodeErrorReply(new TetherError("TETHER_INVALID_STATE", "bridge is not attached")),
      });
      return;
    }
    void targets.bridge.dispatch(msg.path, msg.payload).then((reply) => {
      if (!closed) post({ type: "reply", seq: msg.seq, reply });
    });
  }

  function onMessage(raw: unknown): void {
    const parsed = NativeMessageSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn("invalid message from native port", { error: parsed.error.message });
      return;
    }

    const msg = parsed.data;
    switch (msg.type) {
      case "callResult": {
        const waiter = callWaiters.get(msg.seq);
        if (waiter === undefined) {
          logger.warn("call result for unknown seq", { seq: msg.seq });
          return;
        }
        callWaiters.delete(msg.seq);
        waiter.detach();
        waiter.resolve(msg.reply);
        return;
      }
      case "response": {
        if (targets === null) {
          logger.warn("response before the platform client was attached");
          return;
        }
        targets.platform.deliver(msg.response);
        return;
      }
      case "dispatch": {
        handleDispatch(msg);
        return;
      }
      case "post": {
        if (targets === null) {
          logger.warn("post before the bridge was attached", { path: msg.path });
          return;
        }
        const ack = targets.bridge.post(msg.path, msg.payload);
        logger.trace("post acknowledged", { path: msg.path, ack });
        return;
      }
    }
  }

  port.on("message", onMessage);
  port.on("close", onClose);

  const transport: PlatformTransport = Object.freeze({
    call(path: string, payload: string | null, signal: AbortSignal): Promise<string> {
      if (closed) return Promise.reject(terminalError());
      if (signal.aborted) {
        return Promise.reject(new TetherError("TETHER_CANCELLED", `call ${path} was abandoned`));
      }
      const seq = nextSeq++;
      return new Promise<string>((resolve, reject) => {
        const onAbandon = (): void => {
          if (!callWaiters.delete(seq)) return;
          reject(new TetherError("TETHER_CANCELLED", `call ${path} was abandoned`));
        };
        signal.addEventListener("abort", onAbandon, { once: true });
        const detach = (): void => signal.removeEventListener("abort", onAbandon);

        callWaiters.set(seq, { resolve, reject, detach });
        try {
          post({ type: "call", seq, path, payload });
        } catch (err: unknown) {
          callWaiters.delete(seq);
          detach();
          const detail = `posting ${path} failed: ${describeThrown(err)}`;
          reject(new TetherError("TETHER_TRANSPORT_TERMINAL", detail, { cause: err }));
        }
      });
    },

    send(path: string, payload: string | null): void {
      if (closed) throw terminalError();
      post({ type: "send", path, payload });
    },
  });

  return Object.freeze({
    transport,

    attach(next: LinkTargets): void {
      if (targets !== null) {
        throw new TetherError("TETHER_INVALID_STATE", "message port link is already attached");
      }
      targets = next;
    },

    close(): void {
      if (closed) return;
      onClose();
      port.close();
    },

    isClosed: () => closed,
  });
}
