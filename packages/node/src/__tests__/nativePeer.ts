import type { MessagePort } from "node:worker_threads";
import { type AppMessage, AppMessageSchema, type NativeMessage } from "../transport/protocol.js";

/**
 * The native end of a MessageChannel, as seen by tests: sends typed native
 * messages and hands back app messages in arrival order.
 */
export type NativePeer = Readonly<{
  send: (msg: NativeMessage) => void;
  next: () => Promise<AppMessage>;
}>;

export function createNativePeer(port: MessagePort): NativePeer {
  const queued: AppMessage[] = [];
  const waiters: Array<(msg: AppMessage) => void> = [];

  port.on("message", (raw: unknown) => {
    const msg = AppMessageSchema.parse(raw);
    const waiter = waiters.shift();
    if (waiter === undefined) queued.push(msg);
    else waiter(msg);
  });

  return Object.freeze({
    send: (msg: NativeMessage) => port.postMessage(msg),
    next(): Promise<AppMessage> {
      const msg = queued.shift();
      if (msg !== undefined) return Promise.resolve(msg);
      return new Promise<AppMessage>((resolve) => {
        waiters.push(resolve);
      });
    },
  });
}
