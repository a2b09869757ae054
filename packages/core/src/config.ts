import { TetherError } from "./errors.js";
import type { LogSeverity } from "./logger.js";

/**
 * User-facing runtime configuration. Every field is optional.
 */
export type TetherConfig = Readonly<{
  /** Maximum number of entries waiting on the dispatch queue. */
  queueCapacity?: number;
  /** Bound on a native round trip in milliseconds; 0 disables the bound. */
  requestTimeoutMs?: number;
  /** Maximum number of entries a page history keeps. */
  historyMaxDepth?: number;
  /** Minimum severity written by the default logger. */
  logLevel?: LogSeverity;
  /** Name reported when the native layer cannot provide one. */
  appName?: string;
}>;

/** Resolved configuration with defaults applied. */
export type ResolvedTetherConfig = Readonly<{
  queueCapacity: number;
  requestTimeoutMs: number;
  historyMaxDepth: number;
  logLevel: LogSeverity;
  appName: string;
}>;

/** Default configuration values. */
export const DEFAULT_CONFIG: ResolvedTetherConfig = Object.freeze({
  queueCapacity: 4096,
  requestTimeoutMs: 30_000,
  historyMaxDepth: 50,
  logLevel: "warn",
  appName: "app",
});

function invalid(detail: string): never {
  throw new TetherError("TETHER_INVALID_PROPS", detail);
}

function positiveIntOr(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value <= 0) {
    invalid(`${name} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

function nonNegativeIntOr(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 0) {
    invalid(`${name} must be a non-negative integer, got ${String(value)}`);
  }
  return value;
}

type MutableConfig = { -readonly [K in keyof TetherConfig]: TetherConfig[K] };

/**
 * Layer configs left to right; a later layer wins for every field it sets.
 * Fields present but `undefined` leave the earlier value in place.
 */
export function mergeConfig(...layers: readonly TetherConfig[]): TetherConfig {
  const out: MutableConfig = {};
  for (const layer of layers) {
    if (layer.queueCapacity !== undefined) out.queueCapacity = layer.queueCapacity;
    if (layer.requestTimeoutMs !== undefined) out.requestTimeoutMs = layer.requestTimeoutMs;
    if (layer.historyMaxDepth !== undefined) out.historyMaxDepth = layer.historyMaxDepth;
    if (layer.logLevel !== undefined) out.logLevel = layer.logLevel;
    if (layer.appName !== undefined) out.appName = layer.appName;
  }
  return Object.freeze(out);
}

export function resolveConfig(config: TetherConfig = {}): ResolvedTetherConfig {
  const appName = config.appName?.trim() ?? DEFAULT_CONFIG.appName;
  if (appName.length === 0) invalid("appName must be a non-empty string");

  return Object.freeze({
    queueCapacity: positiveIntOr("queueCapacity", config.queueCapacity, DEFAULT_CONFIG.queueCapacity),
    requestTimeoutMs: nonNegativeIntOr(
      "requestTimeoutMs",
      config.requestTimeoutMs,
      DEFAULT_CONFIG.requestTimeoutMs,
    ),
    historyMaxDepth: positiveIntOr(
      "historyMaxDepth",
      config.historyMaxDepth,
      DEFAULT_CONFIG.historyMaxDepth,
    ),
    logLevel: config.logLevel ?? DEFAULT_CONFIG.logLevel,
    appName,
  });
}
