import { type TetherConfig, TetherError, parseLogSeverity } from "@tether/core";

type MutableConfig = { -readonly [K in keyof TetherConfig]: TetherConfig[K] };

const INT_RE = /^\d+$/;

function readInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim().length === 0) return undefined;
  const trimmed = raw.trim();
  if (!INT_RE.test(trimmed)) {
    throw new TetherError("TETHER_INVALID_PROPS", `${name} must be an integer, got "${raw}"`);
  }
  return Number(trimmed);
}

/**
 * Read configuration overrides from the environment:
 *   TETHER_QUEUE_CAPACITY, TETHER_REQUEST_TIMEOUT_MS, TETHER_HISTORY_DEPTH,
 *   TETHER_LOG_LEVEL.
 * Unset or blank variables are left out.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): TetherConfig {
  const out: MutableConfig = {};

  const queueCapacity = readInt(env, "TETHER_QUEUE_CAPACITY");
  if (queueCapacity !== undefined) out.queueCapacity = queueCapacity;

  const requestTimeoutMs = readInt(env, "TETHER_REQUEST_TIMEOUT_MS");
  if (requestTimeoutMs !== undefined) out.requestTimeoutMs = requestTimeoutMs;

  const historyMaxDepth = readInt(env, "TETHER_HISTORY_DEPTH");
  if (historyMaxDepth !== undefined) out.historyMaxDepth = historyMaxDepth;

  const rawLevel = env.TETHER_LOG_LEVEL;
  if (rawLevel !== undefined && rawLevel.trim().length > 0) {
    const level = parseLogSeverity(rawLevel);
    if (level === null) {
      throw new TetherError(
        "TETHER_INVALID_PROPS",
        `TETHER_LOG_LEVEL must be one of trace, info, warn, error; got "${rawLevel}"`,
      );
    }
    out.logLevel = level;
  }

  return Object.freeze(out);
}
