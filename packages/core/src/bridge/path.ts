import { TetherError } from "../errors.js";

/**
 * Base used to resolve bridge paths into URL objects handed to handlers.
 */
export const BRIDGE_URL_BASE = "tether://bridge";

const SEGMENT_RE = /^[A-Za-z0-9._~-]+$/;

export type BridgePath = Readonly<{
  /** The path as received, including any query string. */
  raw: string;
  /** Pathname only, used as the registry key. */
  path: string;
  /** Full origin URL (pathname + query) passed to handlers. */
  url: URL;
}>;

function invalidPath(raw: string, detail: string): never {
  throw new TetherError("TETHER_INVALID_PATH", `invalid bridge path "${raw}": ${detail}`);
}

function validatePathname(raw: string, pathname: string): void {
  const segments = pathname.slice(1).split("/");
  for (const segment of segments) {
    if (segment.length === 0) invalidPath(raw, "empty segment");
    if (!SEGMENT_RE.test(segment)) invalidPath(raw, `bad segment "${segment}"`);
  }
}

/**
 * Parse `/<segment>[/<segment>...][?key=value&...]`.
 */
export function parseBridgePath(raw: string): BridgePath {
  if (!raw.startsWith("/") || raw.startsWith("//")) {
    invalidPath(raw, "must start with a single '/'");
  }
  if (raw.includes("#")) invalidPath(raw, "fragments are not allowed");

  const queryAt = raw.indexOf("?");
  const pathname = queryAt === -1 ? raw : raw.slice(0, queryAt);
  validatePathname(raw, pathname);

  return Object.freeze({
    raw,
    path: pathname,
    url: new URL(raw, BRIDGE_URL_BASE),
  });
}

/**
 * Validate a registration key: a pathname without query string.
 */
export function normalizeHandlerPath(path: string): string {
  const trimmed = path.trim();
  if (trimmed.includes("?")) invalidPath(path, "handler paths cannot carry a query");
  return parseBridgePath(trimmed).path;
}

/**
 * Append query parameters to a bridge path.
 */
export function withQuery(path: string, params: Readonly<Record<string, string>>): string {
  const keys = Object.keys(params);
  if (keys.length === 0) return path;

  const search = new URLSearchParams();
  for (const key of keys) {
    const value = params[key];
    if (value !== undefined) search.append(key, value);
  }
  const separator = path.includes("?") ? "&" : "?";
  return `${path}${separator}${search.toString()}`;
}
