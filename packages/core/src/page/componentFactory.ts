import { TetherError } from "../errors.js";
import type { Component, ComponentCreator } from "./types.js";

export type ComponentFactory = Readonly<{
  register: (name: string, create: ComponentCreator) => void;
  /** Build a new instance. Throws TETHER_NOT_FOUND for unknown names. */
  create: (name: string) => Component;
  has: (name: string) => boolean;
  names: () => readonly string[];
}>;

function normalizeName(name: string): string {
  const normalized = name.trim().toLowerCase();
  if (normalized.length === 0) {
    throw new TetherError("TETHER_INVALID_PROPS", "component name must be a non-empty string");
  }
  return normalized;
}

export function createComponentFactory(): ComponentFactory {
  const creators = new Map<string, ComponentCreator>();

  return Object.freeze({
    register(name: string, create: ComponentCreator): void {
      const key = normalizeName(name);
      if (creators.has(key)) {
        throw new TetherError("TETHER_INVALID_PROPS", `duplicate component name: ${key}`);
      }
      creators.set(key, create);
    },

    create(name: string): Component {
      const key = normalizeName(name);
      const create = creators.get(key);
      if (create === undefined) {
        throw new TetherError("TETHER_NOT_FOUND", `component ${key} is not registered`);
      }
      return create();
    },

    has: (name: string) => creators.has(name.trim().toLowerCase()),
    names: () => Object.freeze(Array.from(creators.keys()).sort()),
  });
}
