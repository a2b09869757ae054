/**
 * Per-page navigation history.
 *
 * Holds one immutable HistoryState and swaps it in a single assignment per
 * operation, so every call observes and leaves a consistent state.
 */

import {
  type HistorySnapshot,
  type HistoryState,
  canNextFromState,
  canPreviousFromState,
  currentFromState,
  deserializeHistoryState,
  emptyHistoryState,
  newEntryState,
  nextState,
  peekNextFromState,
  peekPreviousFromState,
  previousState,
  serializeHistoryState,
} from "./state.js";

export type { HistorySnapshot } from "./state.js";

export type HistoryOptions = Readonly<{
  maxDepth?: number;
  /** Restore from a snapshot instead of starting empty. */
  snapshot?: HistorySnapshot;
}>;

export type History = Readonly<{
  /** Entry under the cursor. Throws TETHER_NOT_FOUND when empty. */
  current: () => string;
  newEntry: (url: string) => void;
  /** Step back and return the new current entry. */
  previous: () => string;
  /** Step forward and return the new current entry. */
  next: () => string;
  canPrevious: () => boolean;
  canNext: () => boolean;
  peekPrevious: () => string | null;
  peekNext: () => string | null;
  entries: () => readonly string[];
  cursor: () => number;
  length: () => number;
  snapshot: () => HistorySnapshot;
}>;

export function createHistory(opts: HistoryOptions = {}): History {
  let state: HistoryState =
    opts.snapshot !== undefined
      ? deserializeHistoryState(opts.snapshot)
      : emptyHistoryState(opts.maxDepth);

  return Object.freeze({
    current: () => currentFromState(state),

    newEntry(url: string): void {
      state = newEntryState(state, url);
    },

    previous(): string {
      state = previousState(state);
      return currentFromState(state);
    },

    next(): string {
      state = nextState(state);
      return currentFromState(state);
    },

    canPrevious: () => canPreviousFromState(state),
    canNext: () => canNextFromState(state),
    peekPrevious: () => peekPreviousFromState(state),
    peekNext: () => peekNextFromState(state),
    entries: () => state.entries,
    cursor: () => state.cursor,
    length: () => state.entries.length,
    snapshot: () => serializeHistoryState(state),
  });
}
