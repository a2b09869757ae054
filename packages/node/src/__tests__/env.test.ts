import assert from "node:assert/strict";
import test from "node:test";
import { isTetherError } from "@tether/core";
import { readEnvConfig } from "../config/env.js";

test("readEnvConfig: unset and blank variables are left out", () => {
  assert.deepEqual(readEnvConfig({}), {});
  assert.deepEqual(readEnvConfig({ TETHER_QUEUE_CAPACITY: "  ", TETHER_LOG_LEVEL: "" }), {});
});

test("readEnvConfig: reads every TETHER_* setting", () => {
  const config = readEnvConfig({
    TETHER_QUEUE_CAPACITY: " 16 ",
    TETHER_REQUEST_TIMEOUT_MS: "0",
    TETHER_HISTORY_DEPTH: "10",
    TETHER_LOG_LEVEL: "WARN",
    UNRELATED: "x",
  });
  assert.deepEqual(config, {
    queueCapacity: 16,
    requestTimeoutMs: 0,
    historyMaxDepth: 10,
    logLevel: "warn",
  });
});

test("readEnvConfig: rejects values that are not integers", () => {
  for (const raw of ["-1", "1.5", "ten"]) {
    assert.throws(
      () => readEnvConfig({ TETHER_HISTORY_DEPTH: raw }),
      (err: unknown) =>
        isTetherError(err, "TETHER_INVALID_PROPS") &&
        err.message === `TETHER_HISTORY_DEPTH must be an integer, got "${raw}"`,
    );
  }
});

test("readEnvConfig: rejects an unknown log level", () => {
  assert.throws(
    () => readEnvConfig({ TETHER_LOG_LEVEL: "loud" }),
    (err: unknown) => isTetherError(err, "TETHER_INVALID_PROPS"),
  );
});
