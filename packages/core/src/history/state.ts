import { DEFAULT_CONFIG } from "../config.js";
import { TetherError } from "../errors.js";

/**
 * Immutable navigation state. `cursor` is -1 iff `entries` is empty.
 */
export type HistoryState = Readonly<{
  maxDepth: number;
  entries: readonly string[];
  cursor: number;
}>;

/** Plain-data form of a history, used to restore one. */
export type HistorySnapshot = Readonly<{
  maxDepth: number;
  entries: readonly string[];
  cursor: number;
}>;

function throwInvalidProps(detail: string): never {
  throw new TetherError("TETHER_INVALID_PROPS", detail);
}

function createState(maxDepth: number, entries: readonly string[], cursor: number): HistoryState {
  return Object.freeze({
    maxDepth,
    entries: Object.freeze(entries.slice()),
    cursor,
  });
}

export function emptyHistoryState(maxDepth: number = DEFAULT_CONFIG.historyMaxDepth): HistoryState {
  if (!Number.isInteger(maxDepth) || maxDepth <= 0) {
    throwInvalidProps("history maxDepth must be a positive integer");
  }
  return createState(maxDepth, [], -1);
}

function pushBounded(entries: readonly string[], url: string, maxDepth: number): string[] {
  const next = [...entries, url];
  if (next.length > maxDepth) {
    next.shift();
  }
  return next;
}

export function currentFromState(state: HistoryState): string {
  const current = state.entries[state.cursor];
  if (current === undefined) {
    throw new TetherError("TETHER_NOT_FOUND", "history is empty");
  }
  return current;
}

/**
 * Drop every entry above the cursor, then append `url` and point at it.
 */
export function newEntryState(state: HistoryState, url: string): HistoryState {
  const kept = state.entries.slice(0, state.cursor + 1);
  const entries = pushBounded(kept, url, state.maxDepth);
  return createState(state.maxDepth, entries, entries.length - 1);
}

export function canPreviousFromState(state: HistoryState): boolean {
  return state.cursor > 0;
}

export function canNextFromState(state: HistoryState): boolean {
  return state.cursor >= 0 && state.cursor < state.entries.length - 1;
}

export function previousState(state: HistoryState): HistoryState {
  if (!canPreviousFromState(state)) {
    throw new TetherError("TETHER_NOT_FOUND", "no previous history entry");
  }
  return createState(state.maxDepth, state.entries, state.cursor - 1);
}

export function nextState(state: HistoryState): HistoryState {
  if (!canNextFromState(state)) {
    throw new TetherError("TETHER_NOT_FOUND", "no next history entry");
  }
  return createState(state.maxDepth, state.entries, state.cursor + 1);
}

export function peekPreviousFromState(state: HistoryState): string | null {
  if (!canPreviousFromState(state)) return null;
  return state.entries[state.cursor - 1] ?? null;
}

export function peekNextFromState(state: HistoryState): string | null {
  if (!canNextFromState(state)) return null;
  return state.entries[state.cursor + 1] ?? null;
}

export function serializeHistoryState(state: HistoryState): HistorySnapshot {
  return Object.freeze({
    maxDepth: state.maxDepth,
    entries: Object.freeze(state.entries.slice()),
    cursor: state.cursor,
  });
}

/**
 * Validate a snapshot and turn it back into state.
 */
export function deserializeHistoryState(snapshot: HistorySnapshot): HistoryState {
  const maxDepth = snapshot.maxDepth;
  if (!Number.isInteger(maxDepth) || maxDepth <= 0) {
    throwInvalidProps("history snapshot maxDepth must be a positive integer");
  }
  if (!Array.isArray(snapshot.entries)) {
    throwInvalidProps("history snapshot entries must be an array");
  }
  if (snapshot.entries.length > maxDepth) {
    throwInvalidProps("history snapshot holds more entries than maxDepth");
  }
  for (const entry of snapshot.entries) {
    if (typeof entry !== "string" || entry.length === 0) {
      throwInvalidProps("history snapshot entries must be non-empty strings");
    }
  }

  const cursor = snapshot.cursor;
  const validCursor =
    snapshot.entries.length === 0
      ? cursor === -1
      : Number.isInteger(cursor) && cursor >= 0 && cursor < snapshot.entries.length;
  if (!validCursor) {
    throwInvalidProps(
      `history snapshot cursor ${String(cursor)} is out of range for ${String(snapshot.entries.length)} entries`,
    );
  }

  return createState(maxDepth, snapshot.entries, cursor);
}
