import { assert, describe, test } from "@tether/testkit";
import { createElementDirectory } from "../../elements/directory.js";
import { isTetherError } from "../../errors.js";
import {
  type FakeMarkup,
  type FakeMarkupOptions,
  componentLabel,
  createFakeMarkup,
} from "../../testing/index.js";
import { createComponentFactory } from "../componentFactory.js";
import { type Page, createPage } from "../page.js";
import type { PageConfig } from "../types.js";

function setup(markupOpts: FakeMarkupOptions = {}) {
  const directory = createElementDirectory();
  const factory = createComponentFactory();
  let serial = 0;
  for (const name of ["home", "settings", "about"]) {
    factory.register(name, () => {
      serial++;
      return { name, serial };
    });
  }

  let clock = 1000;
  let ids = 0;
  const markups: FakeMarkup[] = [];
  const closed: string[] = [];

  const open = (config: PageConfig = {}): Page =>
    createPage(
      {
        directory,
        factory,
        createMarkup: () => {
          const markup = createFakeMarkup(markupOpts);
          markups.push(markup);
          return markup;
        },
        now: () => clock,
        nextId: () => {
          ids++;
          return `p${String(ids)}`;
        },
        onClose: (page) => {
          closed.push(page.id);
        },
      },
      config,
    );

  return {
    directory,
    open,
    closed,
    markup: (i = 0): FakeMarkup => {
      const markup = markups[i];
      if (markup === undefined) throw new Error(`no markup #${String(i)}`);
      return markup;
    },
    tick: (ms: number) => {
      clock += ms;
    },
  };
}

function currentName(page: Page): string | null {
  const component = page.component();
  return component === null ? null : componentLabel(component);
}

describe("page", () => {
  test("registers itself and loads the default url", () => {
    const { directory, open, markup } = setup();
    const page = open({ defaultUrl: "app://home" });

    assert.equal(page.id, "p1");
    assert.equal(directory.element("p1"), page);
    assert.equal(page.url(), "app://home");
    assert.equal(currentName(page), "home");
    assert.deepEqual(markup().events(), ["mount:home"]);
  });

  test("without a default url nothing is mounted", () => {
    const { open } = setup();
    const page = open();
    assert.equal(page.url(), null);
    assert.equal(page.component(), null);
    assert.equal(page.referer(), null);
  });

  test("loading dismounts the previous component first", () => {
    const { open, markup } = setup();
    const page = open({ defaultUrl: "app://home" });
    page.load("app://settings");

    assert.deepEqual(markup().events(), ["mount:home", "dismount:home", "mount:settings"]);
    assert.deepEqual(page.history().entries(), ["app://home", "app://settings"]);
    assert.equal(markup().mounted().length, 1);
  });

  test("loading the current url remounts without a new entry", () => {
    const { open } = setup();
    const page = open({ defaultUrl: "app://home" });
    page.load("app://home");
    assert.equal(page.history().length(), 1);
    assert.equal(currentName(page), "home");
  });

  test("reload is idempotent on history and mounted component name", () => {
    const { open, markup } = setup();
    const page = open({ defaultUrl: "app://home" });
    page.load("app://settings");
    const before = page.history().snapshot();
    const first = page.component();

    page.reload();
    page.reload();

    assert.deepEqual(page.history().snapshot(), before);
    assert.equal(currentName(page), "settings");
    assert.notEqual(page.component(), first);
    assert.deepEqual(markup().events().slice(-4), [
      "dismount:settings",
      "mount:settings",
      "dismount:settings",
      "mount:settings",
    ]);
  });

  test("previous and next navigate and a failed step changes nothing", () => {
    const { open } = setup();
    const page = open({ defaultUrl: "app://home" });
    page.load("app://settings");

    page.previous();
    assert.equal(currentName(page), "home");
    assert.equal(page.canNext(), true);

    const mounted = page.component();
    assert.throws(
      () => page.previous(),
      (err: unknown) => isTetherError(err, "TETHER_NOT_FOUND"),
    );
    assert.equal(page.component(), mounted);

    page.next();
    assert.equal(currentName(page), "settings");
    assert.equal(page.canNext(), false);
  });

  test("referer peeks without moving the cursor", () => {
    const { open } = setup();
    const page = open({ defaultUrl: "app://home" });
    page.load("app://settings");

    assert.equal(page.referer(), "app://home");
    assert.equal(page.referer(), "app://home");
    assert.equal(page.url(), "app://settings");
    assert.equal(page.history().cursor(), 1);
  });

  test("a mount failure names the url and page and leaves nothing mounted", () => {
    const { open } = setup({
      failMount: (component) => componentLabel(component) === "settings",
    });
    const page = open({ defaultUrl: "app://home" });

    assert.throws(
      () => page.load("app://settings"),
      (err: unknown) =>
        isTetherError(err, "TETHER_MOUNT_FAILED") &&
        err.message === "loading app://settings in page p1 failed: Error: cannot mount settings" &&
        err.cause instanceof Error,
    );
    assert.equal(page.component(), null);
    assert.equal(page.url(), "app://settings");
  });

  test("an unknown component leaves nothing mounted", () => {
    const { open, markup } = setup();
    const page = open({ defaultUrl: "app://home" });
    assert.throws(
      () => page.load("app://missing"),
      (err: unknown) => isTetherError(err, "TETHER_NOT_FOUND"),
    );
    assert.equal(page.component(), null);
    assert.deepEqual(markup().events(), ["mount:home", "dismount:home"]);
  });

  test("a failing default url closes the page and rethrows", () => {
    const { directory, open, closed } = setup();
    assert.throws(
      () => open({ defaultUrl: "app://missing" }),
      (err: unknown) => isTetherError(err, "TETHER_NOT_FOUND"),
    );
    assert.equal(directory.size(), 0);
    assert.deepEqual(closed, ["p1"]);
  });

  test("render delegates to the markup engine", () => {
    const { open, markup } = setup();
    const page = open({ defaultUrl: "app://about" });
    const component = page.component();
    if (component === null) throw new Error("expected a mounted component");
    assert.equal(page.contains(component), true);

    page.render(component);
    assert.deepEqual(markup().events(), ["mount:about", "update:about"]);
  });

  test("focus records the focus time", () => {
    const { open, tick } = setup();
    const page = open();
    assert.equal(page.lastFocus(), 1000);
    tick(250);
    page.focus();
    assert.equal(page.lastFocus(), 1250);
  });

  test("close is idempotent and ends navigation", () => {
    const { directory, open, closed } = setup();
    const page = open({ defaultUrl: "app://home" });

    page.close();
    page.close();

    assert.equal(page.isClosed(), true);
    assert.equal(directory.get("p1"), null);
    assert.deepEqual(closed, ["p1"]);
    assert.throws(
      () => page.load("app://settings"),
      (err: unknown) => isTetherError(err, "TETHER_INVALID_STATE"),
    );
  });
});
