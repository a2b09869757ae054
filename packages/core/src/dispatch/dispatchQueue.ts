/**
 * Single-consumer ordered task queue.
 *
 * Why: Native events arrive from many native threads, but application state
 * (pages, histories, mounted components, the element directory) must only be
 * mutated from one logical thread. Every handler invocation and every
 * application-originated mutation is a task on this queue.
 *
 * Invariants:
 *   - Tasks run strictly in enqueue order, one at a time. An async task is
 *     awaited before the next one starts.
 *   - post()/call() never reorder and never run a task inline.
 *   - A throwing task is logged and isolated; the worker moves on.
 *   - A task throwing TETHER_FATAL faults the queue: a FatalReport is emitted,
 *     queued entries are abandoned, and later enqueues fail with TETHER_SHUTDOWN.
 *   - A task that awaits call() of an entry queued behind itself deadlocks.
 *     Compose such work as a single task.
 */

import { DEFAULT_CONFIG } from "../config.js";
import { TetherError, type TetherErrorCode, describeThrown, isTetherError } from "../errors.js";
import { type Logger, SILENT_LOGGER } from "../logger.js";

export type DispatchTask<T> = () => T | Promise<T>;

export type DispatchQueueState = "Running" | "Closed" | "Faulted";

/**
 * Structured description of the fault that shut a queue down.
 */
export type FatalReport = Readonly<{
  code: TetherErrorCode;
  detail: string;
  /** Label of the task that raised the fault. */
  label: string;
  error: unknown;
  atMs: number;
}>;

export type FatalListener = (report: FatalReport) => void;

export type DispatchQueueOptions = Readonly<{
  capacity?: number;
  logger?: Logger;
  now?: () => number;
}>;

export type DispatchQueue = Readonly<{
  /** Enqueue a task without waiting for it. */
  post: (task: DispatchTask<unknown>, label?: string) => void;
  /** Enqueue a task and resolve with its result once the worker ran it. */
  call: <T>(task: DispatchTask<T>, label?: string) => Promise<T>;
  /** Resolves once nothing is queued or running. */
  idle: () => Promise<void>;
  /** Stop the worker; queued entries are abandoned. Idempotent. */
  close: (reason?: Error) => void;
  onFatal: (listener: FatalListener) => () => void;
  size: () => number;
  state: () => DispatchQueueState;
  isExecuting: () => boolean;
  fatalReport: () => FatalReport | null;
}>;

type Entry = Readonly<{
  label: string;
  /** Runs the task and hands its result to whoever is waiting. */
  execute: () => Promise<void>;
  reject: (err: Error) => void;
}>;

function ignoreRejection(): void {}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(describeThrown(err));
}

export function createDispatchQueue(opts: DispatchQueueOptions = {}): DispatchQueue {
  const capacity = opts.capacity ?? DEFAULT_CONFIG.queueCapacity;
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new TetherError("TETHER_INVALID_PROPS", "dispatch queue capacity must be a positive integer");
  }
  const logger = opts.logger ?? SILENT_LOGGER;
  const now = opts.now ?? Date.now;

  const entries: Entry[] = [];
  const fatalListeners = new Set<FatalListener>();
  let idleWaiters: Array<() => void> = [];
  let state: DispatchQueueState = "Running";
  let draining = false;
  let executing = false;
  let fatal: FatalReport | null = null;

  function shutdownError(): TetherError {
    if (fatal !== null) {
      return new TetherError("TETHER_SHUTDOWN", `dispatch queue faulted: ${fatal.detail}`);
    }
    return new TetherError("TETHER_SHUTDOWN", "dispatch queue closed");
  }

  function assertAccepting(): void {
    if (state !== "Running") throw shutdownError();
    if (entries.length >= capacity) {
      throw new TetherError(
        "TETHER_QUEUE_FULL",
        `dispatch queue is full (capacity=${String(capacity)})`,
      );
    }
  }

  function notifyIdle(): void {
    if (draining || (entries.length > 0 && state === "Running")) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  function abandon(err: Error): void {
    const abandoned = entries.splice(0, entries.length);
    for (const entry of abandoned) entry.reject(err);
    if (abandoned.length > 0) {
      logger.warn("dispatch queue abandoned entries", { count: abandoned.length });
    }
  }

  function fault(entry: Entry, err: TetherError): void {
    const report: FatalReport = Object.freeze({
      code: err.code,
      detail: err.message,
      label: entry.label,
      error: err,
      atMs: now(),
    });
    fatal = report;
    state = "Faulted";
    logger.error("fatal fault on dispatch worker", { label: entry.label, detail: err.message });
    for (const listener of Array.from(fatalListeners)) {
      try {
        listener(report);
      } catch (listenerErr: unknown) {
        logger.error("fatal listener threw", { error: describeThrown(listenerErr) });
      }
    }
    abandon(shutdownError());
  }

  async function runEntry(entry: Entry): Promise<void> {
    executing = true;
    try {
      await entry.execute();
    } catch (err: unknown) {
      if (isTetherError(err, "TETHER_FATAL")) {
        entry.reject(err);
        fault(entry, err);
        return;
      }
      logger.error("handler failed on dispatch worker", {
        label: entry.label,
        error: describeThrown(err),
      });
      entry.reject(toError(err));
    } finally {
      executing = false;
    }
  }

  async function drain(): Promise<void> {
    try {
      while (state === "Running") {
        const entry = entries.shift();
        if (entry === undefined) break;
        await runEntry(entry);
      }
    } finally {
      draining = false;
      if (state === "Running" && entries.length > 0) {
        schedule();
      } else {
        notifyIdle();
      }
    }
  }

  function schedule(): void {
    if (draining) return;
    draining = true;
    queueMicrotask(() => {
      void drain();
    });
  }

  function enqueue(entry: Entry): void {
    entries.push(entry);
    schedule();
  }

  return Object.freeze({
    post(task: DispatchTask<unknown>, label = "task"): void {
      assertAccepting();
      enqueue({
        label,
        execute: async () => {
          await task();
        },
        reject: ignoreRejection,
      });
    },

    call<T>(task: DispatchTask<T>, label = "task"): Promise<T> {
      try {
        assertAccepting();
      } catch (err: unknown) {
        return Promise.reject(toError(err));
      }
      return new Promise<T>((resolve, reject) => {
        enqueue({
          label,
          execute: async () => {
            resolve(await task());
          },
          reject,
        });
      });
    },

    idle(): Promise<void> {
      if (!draining && (entries.length === 0 || state !== "Running")) return Promise.resolve();
      return new Promise<void>((resolve) => {
        idleWaiters.push(resolve);
      });
    },

    close(reason?: Error): void {
      if (state !== "Running") return;
      state = "Closed";
      abandon(reason ?? shutdownError());
      notifyIdle();
    },

    onFatal(listener: FatalListener): () => void {
      fatalListeners.add(listener);
      return () => {
        fatalListeners.delete(listener);
      };
    },

    size: () => entries.length,
    state: () => state,
    isExecuting: () => executing,
    fatalReport: () => fatal,
  });
}
