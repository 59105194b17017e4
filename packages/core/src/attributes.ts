import type { PropertyStore } from "./types.js";
import { enumerate } from "./enumerate.js";

export const DEFAULT_COLLISION_GROUP = "default";

/** Property path of one collision-attribute slot's group label. */
export function collisionGroupPath(index: number): string {
  return `m_collisionAttributes[${index}].m_CollisionGroupString`;
}

/**
 * Normalize a collision-group label.
 *
 * Strips the surrounding quotes (the closing quote is the last one in the
 * string, so text after it such as a trailing newline goes too), then
 * lower-cases ASCII letters.
 */
export function cleanCollisionGroup(raw: string): string {
  let cleaned = raw;
  if (cleaned.length >= 2 && cleaned.startsWith('"')) {
    const lastQuote = cleaned.lastIndexOf('"');
    if (lastQuote > 0) {
      cleaned = cleaned.slice(1, lastQuote);
    }
  }
  return cleaned.replace(/[A-Z]/g, (ch) => String.fromCharCode(ch.charCodeAt(0) + 32));
}

/**
 * Indices of the collision-attribute slots whose label is `label`.
 *
 * Slots are read from 0 until the first absent one; a present but
 * empty or different label is skipped and the scan carries on.
 */
export function resolveDefaultIndices(
  store: PropertyStore,
  label: string = DEFAULT_COLLISION_GROUP,
): Set<number> {
  const wanted = label.toLowerCase();
  const accepted = new Set<number>();

  for (const { index, value } of enumerate(store, collisionGroupPath)) {
    if (cleanCollisionGroup(value) === wanted) {
      accepted.add(index);
    }
  }

  return accepted;
}
