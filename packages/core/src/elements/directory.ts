/**
 * Registry of live elements (pages and anything else that hosts components).
 *
 * The component → element mapping is not stored: it is derived from each
 * element's contains(), so removing an element drops both lookups at once.
 */

import { TetherError } from "../errors.js";
import type { Component } from "../page/types.js";

export type DirectoryElement = Readonly<{
  id: string;
  kind: string;
  contains: (component: Component) => boolean;
  render: (component: Component) => void;
  /** Epoch milliseconds of the last focus. */
  lastFocus: () => number;
}>;

export type ElementDirectory = Readonly<{
  /** Throws TETHER_INVALID_STATE when the id is already taken. */
  add: (element: DirectoryElement) => void;
  remove: (element: DirectoryElement) => boolean;
  get: (id: string) => DirectoryElement | null;
  element: (id: string) => DirectoryElement;
  elementByComponent: (component: Component) => DirectoryElement;
  size: () => number;
  /** Live elements, most recently focused first. */
  all: () => readonly DirectoryElement[];
}>;

export function createElementDirectory(): ElementDirectory {
  const elements = new Map<string, DirectoryElement>();

  return Object.freeze({
    add(element: DirectoryElement): void {
      if (elements.has(element.id)) {
        throw new TetherError("TETHER_INVALID_STATE", `element ${element.id} is already registered`);
      }
      elements.set(element.id, element);
    },

    remove(element: DirectoryElement): boolean {
      if (elements.get(element.id) !== element) return false;
      return elements.delete(element.id);
    },

    get: (id: string) => elements.get(id) ?? null,

    element(id: string): DirectoryElement {
      const found = elements.get(id);
      if (found === undefined) {
        throw new TetherError("TETHER_NOT_FOUND", `element ${id} not found`);
      }
      return found;
    },

    elementByComponent(component: Component): DirectoryElement {
      for (const element of elements.values()) {
        if (element.contains(component)) return element;
      }
      throw new TetherError("TETHER_NOT_FOUND", "no element hosts the component");
    },

    size: () => elements.size,

    all(): readonly DirectoryElement[] {
      const sorted = Array.from(elements.values()).sort((a, b) => b.lastFocus() - a.lastFocus());
      return Object.freeze(sorted);
    },
  });
}
