import type { PropertyStore } from "./types.js";

export interface IndexedValue {
  index: number;
  value: string;
}

/**
 * Lazily read `pathOf(0)`, `pathOf(1)`, ... from the store, stopping at the
 * first index with no value. Each iteration starts again from 0.
 */
export function enumerate(
  store: PropertyStore,
  pathOf: (index: number) => string,
): Iterable<IndexedValue> {
  return {
    *[Symbol.iterator]() {
      for (let index = 0; ; index++) {
        const value = store.get(pathOf(index));
        if (value === undefined) return;
        yield { index, value };
      }
    },
  };
}
