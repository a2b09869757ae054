/**
 * Application driver: lifecycle handlers, page routing and the run loop.
 *
 * The native side drives the application through `/driver/*` and `/page/*`
 * bridge paths. run() asks the native layer to start. After `/driver/exit` it
 * waits for the reply to that request and settles with it; a task fault, a
 * failed run request or an aborted signal ends it earlier.
 */

import { z } from "zod";
import type { BridgeHandler } from "../bridge/appBridge.js";
import type { DirectoryElement } from "../elements/directory.js";
import { TetherError, describeThrown, raiseFatal } from "../errors.js";
import { type Page, createPage } from "../page/page.js";
import type { Component, PageConfig } from "../page/types.js";
import { EMPTY_PAYLOAD, type Payload, createPayload } from "../payload/payload.js";
import type { TetherContext } from "./context.js";

export type DriverCallbacks = Readonly<{
  onRun?: () => void | Promise<void>;
  onFocus?: () => void;
  onBlur?: () => void;
  onReopen?: (hasVisibleWindows: boolean) => void;
  onFilesOpen?: (filenames: readonly string[]) => void;
  onUrlOpen?: (url: URL) => void;
  /** Whether the application agrees to quit. Defaults to true. */
  onQuit?: () => boolean;
  onExit?: () => void;
}>;

export type ShareValue = string | URL;

export type Driver = Readonly<{
  run: (signal?: AbortSignal) => Promise<void>;
  isRunning: () => boolean;
  newPage: (config?: PageConfig) => Page;
  /** Re-render `component` in whichever element hosts it. */
  render: (component: Component) => void;
  elementByComponent: (component: Component) => DirectoryElement;
  /** Run `fn` on the dispatch worker and resolve with its result. */
  callOnWorker: <T>(fn: () => T | Promise<T>) => Promise<T>;
  appName: () => Promise<string>;
  share: (value: ShareValue) => Promise<void>;
  droppedFiles: () => readonly string[];
  /** Ask the native layer to quit. */
  close: () => Promise<void>;
}>;

const StringListSchema = z.array(z.string());

function shutdownError(detail: string): TetherError {
  return new TetherError("TETHER_SHUTDOWN", detail);
}

export function createDriver(ctx: TetherContext, callbacks: DriverCallbacks = {}): Driver {
  const { bridge, logger, platform, queue } = ctx;
  const pages = new Map<string, Page>();

  let dropped: readonly string[] = Object.freeze([]);
  let running = false;
  let exited = false;
  let finishRun: (() => void) | null = null;

  function pageFromUrl(url: URL): Page {
    const id = url.searchParams.get("page-id");
    if (id === null || id.length === 0) {
      throw new TetherError("TETHER_DECODE_ERROR", `${url.pathname} requires a page-id parameter`);
    }
    const page = pages.get(id);
    if (page === undefined) {
      throw new TetherError("TETHER_NOT_FOUND", `page ${id} not found`);
    }
    return page;
  }

  function pageHandler(op: (page: Page, payload: Payload) => void): BridgeHandler {
    return (url, payload) => {
      op(pageFromUrl(url), payload);
    };
  }

  bridge.handle("/driver/run", async () => {
    logger.info("driver running");
    if (callbacks.onRun === undefined) return;
    try {
      await callbacks.onRun();
    } catch (err: unknown) {
      raiseFatal(`run handler failed: ${describeThrown(err)}`, err);
    }
  });

  bridge.handle("/driver/focus", () => {
    callbacks.onFocus?.();
  });

  bridge.handle("/driver/blur", () => {
    callbacks.onBlur?.();
  });

  bridge.handle("/driver/reopen", (_url, payload) => {
    callbacks.onReopen?.(payload.decode(z.boolean()));
  });

  bridge.handle("/driver/filesopen", (_url, payload) => {
    callbacks.onFilesOpen?.(Object.freeze(payload.decode(StringListSchema)));
  });

  bridge.handle("/driver/urlopen", (_url, payload) => {
    const raw = payload.decode(z.string());
    let target: URL;
    try {
      target = new URL(raw);
    } catch (err: unknown) {
      throw new TetherError("TETHER_DECODE_ERROR", `parsing url "${raw}" failed`, { cause: err });
    }
    callbacks.onUrlOpen?.(target);
  });

  bridge.handle("/driver/filedrop", (_url, payload) => {
    dropped = Object.freeze(payload.decode(StringListSchema));
  });

  bridge.handle("/driver/quit", () => createPayload(callbacks.onQuit?.() ?? true));

  bridge.handle("/driver/exit", () => {
    callbacks.onExit?.();
    logger.info("driver exited");
    finishRun?.();
  });

  bridge.handle(
    "/page/navigate",
    pageHandler((page, payload) => {
      page.load(payload.decode(z.string().min(1)));
    }),
  );
  bridge.handle("/page/reload", pageHandler((page) => page.reload()));
  bridge.handle("/page/previous", pageHandler((page) => page.previous()));
  bridge.handle("/page/next", pageHandler((page) => page.next()));
  bridge.handle("/page/focus", pageHandler((page) => page.focus()));
  bridge.handle("/page/close", pageHandler((page) => page.close()));

  function shutdown(reason: Error): void {
    queue.close(reason);
    platform.terminate(reason);
  }

  return Object.freeze({
    async run(signal?: AbortSignal): Promise<void> {
      if (running) throw new TetherError("TETHER_INVALID_STATE", "driver is already running");
      if (exited) throw new TetherError("TETHER_INVALID_STATE", "driver has already exited");
      if (signal?.aborted === true) throw shutdownError("driver run cancelled");
      running = true;

      const cleanups: Array<() => void> = [];
      // True until /driver/exit arrives or the run ends some other way.
      let awaitingExit = true;
      try {
        const runRequest = platform.request("/driver/run", EMPTY_PAYLOAD, { timeoutMs: 0 });

        await new Promise<void>((resolve, reject) => {
          finishRun = () => {
            awaitingExit = false;
            resolve();
          };

          cleanups.push(
            queue.onFatal((report) => {
              reject(new TetherError("TETHER_FATAL", report.detail, { cause: report.error }));
            }),
          );

          if (signal !== undefined) {
            const onAbort = (): void => {
              const reason = shutdownError("driver run cancelled");
              shutdown(reason);
              reject(reason);
            };
            signal.addEventListener("abort", onAbort, { once: true });
            cleanups.push(() => signal.removeEventListener("abort", onAbort));
          }

          void runRequest.then(
            () => undefined,
            (err: unknown) => {
              if (!awaitingExit) return;
              logger.error("run request failed", { error: describeThrown(err) });
              reject(err);
            },
          );
        });

        // The native run loop replies once it has wound down; its outcome is
        // the outcome of run().
        await runRequest;
      } finally {
        awaitingExit = false;
        for (const cleanup of cleanups) cleanup();
        finishRun = null;
        running = false;
        exited = true;
        shutdown(shutdownError("driver exited"));
      }
    },

    isRunning: () => running,

    newPage(config: PageConfig = {}): Page {
      const page = createPage(
        {
          directory: ctx.directory,
          factory: ctx.factory,
          createMarkup: ctx.createMarkup,
          historyMaxDepth: ctx.config.historyMaxDepth,
          logger,
          now: ctx.now,
          onClose: (closed) => {
            pages.delete(closed.id);
          },
        },
        config,
      );
      pages.set(page.id, page);
      return page;
    },

    render(component: Component): void {
      ctx.directory.elementByComponent(component).render(component);
    },

    elementByComponent: (component: Component) => ctx.directory.elementByComponent(component),

    callOnWorker: <T>(fn: () => T | Promise<T>) => queue.call(fn, "callOnWorker"),

    async appName(): Promise<string> {
      const reply = await platform.request("/driver/appname");
      const name = reply.isEmpty ? "" : reply.decode(z.string());
      if (name.length !== 0 && name !== "(null)") return name;
      return ctx.config.appName;
    },

    async share(value: ShareValue): Promise<void> {
      const share = {
        value: String(value),
        type: value instanceof URL ? "url" : "string",
      };
      await platform.requestWithAsyncResponse("/driver/share", createPayload(share));
    },

    droppedFiles: () => dropped,

    async close(): Promise<void> {
      await platform.request("/driver/quit");
    },
  });
}
