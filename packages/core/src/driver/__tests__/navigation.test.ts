import { assert, describe, test } from "@tether/testkit";
import { isTetherError } from "../../errors.js";
import { decodeReply } from "../../payload/envelope.js";
import type { Page } from "../../page/page.js";
import { componentLabel } from "../../testing/index.js";
import { setupDriver } from "./helpers.js";

function mountedName(page: Page): string | null {
  const component = page.component();
  return component === null ? null : componentLabel(component);
}

describe("page navigation", () => {
  test("home → settings → previous → next", () => {
    const { driver } = setupDriver();
    const page = driver.newPage();

    page.load("app://home");
    assert.equal(mountedName(page), "home");
    assert.equal(page.history().current(), "app://home");

    page.load("app://settings");
    assert.equal(mountedName(page), "settings");
    assert.equal(page.canPrevious(), true);

    page.previous();
    assert.equal(mountedName(page), "home");
    assert.equal(page.canNext(), true);

    page.next();
    assert.equal(mountedName(page), "settings");
  });

  test("the same scenario driven over the bridge", async () => {
    const { ctx, driver } = setupDriver();
    const page = driver.newPage({ defaultUrl: "app://home" });
    const at = (path: string) => `${path}?page-id=${page.id}`;

    assert.equal(await ctx.bridge.dispatch(at("/page/navigate"), '"app://settings"'), '{"ok":true}');
    assert.equal(mountedName(page), "settings");

    await ctx.bridge.dispatch(at("/page/previous"), null);
    assert.equal(mountedName(page), "home");

    await ctx.bridge.dispatch(at("/page/next"), null);
    assert.equal(mountedName(page), "settings");

    await ctx.bridge.dispatch(at("/page/reload"), null);
    assert.equal(mountedName(page), "settings");
    assert.deepEqual(page.history().entries(), ["app://home", "app://settings"]);
  });

  test("page requests need a live page id", async () => {
    const { ctx, driver } = setupDriver();
    const page = driver.newPage({ defaultUrl: "app://home" });
    const code = async (path: string): Promise<string | null> => {
      const result = decodeReply(await ctx.bridge.dispatch(path, null));
      return result.ok ? null : result.error.code;
    };

    assert.equal(await code("/page/reload"), "TETHER_DECODE_ERROR");
    assert.equal(await code("/page/reload?page-id=nope"), "TETHER_NOT_FOUND");
    assert.equal(await code(`/page/previous?page-id=${page.id}`), "TETHER_NOT_FOUND");

    assert.equal(await code(`/page/close?page-id=${page.id}`), null);
    assert.equal(page.isClosed(), true);
    assert.equal(ctx.directory.get(page.id), null);
    assert.equal(await code(`/page/reload?page-id=${page.id}`), "TETHER_NOT_FOUND");
  });

  test("focus over the bridge moves the page to the front", async () => {
    let clock = 100;
    const { ctx, driver } = setupDriver({}, {}, () => clock);
    const first = driver.newPage();
    clock = 200;
    const second = driver.newPage();
    assert.deepEqual(
      ctx.directory.all().map((el) => el.id),
      [second.id, first.id],
    );

    clock = 300;
    await ctx.bridge.dispatch(`/page/focus?page-id=${first.id}`, null);
    assert.equal(first.lastFocus(), 300);
    assert.deepEqual(
      ctx.directory.all().map((el) => el.id),
      [first.id, second.id],
    );
  });

  test("navigation on a closed page is invalid", () => {
    const { driver } = setupDriver();
    const page = driver.newPage({ defaultUrl: "app://home" });
    page.close();
    assert.throws(
      () => page.next(),
      (err: unknown) => isTetherError(err, "TETHER_INVALID_STATE"),
    );
  });
});
