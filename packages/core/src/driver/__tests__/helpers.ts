import type { TetherConfig } from "../../config.js";
import { createLogger } from "../../logger.js";
import { createComponentFactory } from "../../page/componentFactory.js";
import {
  type FakeMarkup,
  createFakeMarkup,
  createFakeTransport,
  createRecordingSink,
} from "../../testing/index.js";
import { createTetherContext } from "../context.js";
import { type DriverCallbacks, createDriver } from "../driver.js";

export const COMPONENT_NAMES = ["home", "settings", "about"] as const;

export function setupDriver(
  callbacks: DriverCallbacks = {},
  config: TetherConfig = {},
  now: () => number = Date.now,
) {
  const rec = createRecordingSink();
  const transport = createFakeTransport();
  const factory = createComponentFactory();
  for (const name of COMPONENT_NAMES) {
    factory.register(name, () => ({ name }));
  }
  const markups: FakeMarkup[] = [];

  const ctx = createTetherContext({
    transport,
    factory,
    createMarkup: () => {
      const markup = createFakeMarkup();
      markups.push(markup);
      return markup;
    },
    config: { requestTimeoutMs: 0, ...config },
    logger: createLogger({ minSeverity: "info", sink: rec.sink }),
    now,
  });
  const driver = createDriver(ctx, callbacks);
  return { ctx, driver, transport, rec, markups };
}
