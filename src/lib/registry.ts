/**
 * Registry Merger
 *
 * @purpose Fold per-layer entries into one name → entry map, later layers winning
 */

import { compareNames } from "./entry-scanner.js"
import type { Entry, Registry } from "../types/entries.js"

/**
 * Merge entry lists given in precedence order (lowest first).
 * An entry unconditionally replaces any earlier entry of the same name,
 * including one from the same list. The result is keyed in name order.
 */
export function mergeLayers<T extends Entry>(layers: ReadonlyArray<readonly T[]>): Registry<T> {
  const merged = new Map<string, T>()

  for (const entries of layers) {
    for (const entry of entries) {
      merged.set(entry.name, entry)
    }
  }

  const names = [...merged.keys()].sort(compareNames)
  const sorted = new Map<string, T>()
  for (const name of names) {
    const entry = merged.get(name)
    if (entry) sorted.set(name, entry)
  }
  return sorted
}

export function getEntry<T extends Entry>(registry: Registry<T>, name: string): T | null {
  return registry.get(name) ?? null
}

export function listEntries<T extends Entry>(registry: Registry<T>): T[] {
  return [...registry.values()]
}
