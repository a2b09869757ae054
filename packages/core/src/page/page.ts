/**
 * A page: one history, one markup engine and at most one mounted component.
 *
 * Every navigation dismounts the current component before mounting the next
 * one. When a load fails after the dismount the page is left with no mounted
 * component rather than a half-mounted one.
 */

import type { DirectoryElement, ElementDirectory } from "../elements/directory.js";
import { TetherError, describeThrown } from "../errors.js";
import { type History, createHistory } from "../history/history.js";
import { type Logger, SILENT_LOGGER } from "../logger.js";
import type { ComponentFactory } from "./componentFactory.js";
import { componentNameFromUrl } from "./componentName.js";
import type { Component, MarkupFactory, PageConfig } from "./types.js";

export type PageContext = Readonly<{
  directory: ElementDirectory;
  factory: ComponentFactory;
  createMarkup: MarkupFactory;
  historyMaxDepth?: number;
  logger?: Logger;
  now?: () => number;
  /** Supplies page ids; defaults to a process-local counter. */
  nextId?: () => string;
  /** Called once, after the page left the directory. */
  onClose?: (page: Page) => void;
}>;

export type Page = DirectoryElement &
  Readonly<{
    load: (url: string) => void;
    reload: () => void;
    previous: () => void;
    next: () => void;
    canPrevious: () => boolean;
    canNext: () => boolean;
    /** Current URL, or null before the first load. */
    url: () => string | null;
    /** Previous URL without moving the cursor, or null. */
    referer: () => string | null;
    component: () => Component | null;
    focus: () => void;
    close: () => void;
    isClosed: () => boolean;
    history: () => History;
  }>;

let pageCounter = 0;

function nextPageId(): string {
  pageCounter++;
  return `page-${String(pageCounter)}`;
}

export function createPage(ctx: PageContext, config: PageConfig = {}): Page {
  const id = (ctx.nextId ?? nextPageId)();
  const now = ctx.now ?? Date.now;
  const logger = ctx.logger ?? SILENT_LOGGER;
  const markup = ctx.createMarkup();
  const history = createHistory({ maxDepth: ctx.historyMaxDepth });

  let component: Component | null = null;
  let lastFocus = now();
  let closed = false;

  function assertOpen(): void {
    if (closed) {
      throw new TetherError("TETHER_INVALID_STATE", `page ${id} is closed`);
    }
  }

  function mountUrl(url: string): void {
    if (component !== null) {
      const previous = component;
      component = null;
      markup.dismount(previous);
    }

    const next = ctx.factory.create(componentNameFromUrl(url));
    try {
      markup.mount(next);
    } catch (err: unknown) {
      throw new TetherError(
        "TETHER_MOUNT_FAILED",
        `loading ${url} in page ${id} failed: ${describeThrown(err)}`,
        { cause: err },
      );
    }
    component = next;
    logger.trace("page loaded", { page: id, url });
  }

  const page: Page = Object.freeze({
    id,
    kind: "page",

    contains: (c: Component) => markup.contains(c),

    render(c: Component): void {
      assertOpen();
      markup.update(c);
    },

    lastFocus: () => lastFocus,

    load(url: string): void {
      assertOpen();
      const current = history.length() === 0 ? null : history.current();
      if (current !== url) history.newEntry(url);
      mountUrl(url);
    },

    reload(): void {
      assertOpen();
      mountUrl(history.current());
    },

    previous(): void {
      assertOpen();
      mountUrl(history.previous());
    },

    next(): void {
      assertOpen();
      mountUrl(history.next());
    },

    canPrevious: () => history.canPrevious(),
    canNext: () => history.canNext(),
    url: () => (history.length() === 0 ? null : history.current()),
    referer: () => history.peekPrevious(),
    component: () => component,

    focus(): void {
      lastFocus = now();
    },

    close(): void {
      if (closed) return;
      closed = true;
      ctx.directory.remove(page);
      ctx.onClose?.(page);
      logger.trace("page closed", { page: id });
    },

    isClosed: () => closed,
    history: () => history,
  });

  ctx.directory.add(page);

  if (config.defaultUrl !== undefined && config.defaultUrl.length > 0) {
    try {
      page.load(config.defaultUrl);
    } catch (err: unknown) {
      page.close();
      throw err;
    }
  }
  return page;
}
