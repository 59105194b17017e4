import { parseKv3 } from "./parser.js";
import type { Kv3Document, Kv3Value, PathSegment } from "./types.js";

/**
 * Split a property path such as `m_parts[0].m_rnShape.m_hulls[3]` into
 * key and index segments.
 */
export function parsePath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  const pattern = /([^.[\]]+)|\[(\d+)\]|(\.)/g;
  let expectKey = true;
  let consumed = 0;

  for (const match of path.matchAll(pattern)) {
    if (match.index !== consumed) break;
    consumed += match[0].length;

    const [, name, index, dot] = match;
    if (name !== undefined) {
      if (!expectKey) throw new Error(`Invalid property path: ${path}`);
      segments.push({ type: "key", name });
      expectKey = false;
    } else if (index !== undefined) {
      if (expectKey) throw new Error(`Invalid property path: ${path}`);
      segments.push({ type: "index", index: Number(index) });
    } else if (dot !== undefined) {
      if (expectKey) throw new Error(`Invalid property path: ${path}`);
      expectKey = true;
    }
  }

  if (consumed !== path.length || expectKey) {
    throw new Error(`Invalid property path: ${path}`);
  }
  return segments;
}

/** Resolve a path to a node, or `undefined` when any step is missing. */
export function resolvePath(root: Kv3Value, segments: PathSegment[]): Kv3Value | undefined {
  let node: Kv3Value | undefined = root;
  for (const segment of segments) {
    if (node === undefined) return undefined;
    if (segment.type === "key") {
      node = node.type === "object" ? node.entries.get(segment.name) : undefined;
    } else {
      node = node.type === "array" ? node.items[segment.index] : undefined;
    }
  }
  return node;
}

/**
 * Path-addressed read access to a KV3 document.
 *
 * Only leaves have a string value: scalars return their source text and
 * blobs their hex bytes. Objects, arrays and missing paths read as
 * `undefined`, which is distinct from an empty string.
 */
export class PropertyStore {
  readonly document: Kv3Document;

  constructor(document: Kv3Document) {
    this.document = document;
  }

  get(path: string): string | undefined {
    const node = resolvePath(this.document.root, parsePath(path));
    if (node === undefined) return undefined;
    switch (node.type) {
      case "scalar":
        return node.raw;
      case "blob":
        return node.hex;
      default:
        return undefined;
    }
  }

  /** Whether anything (leaf or container) exists at `path`. */
  has(path: string): boolean {
    return resolvePath(this.document.root, parsePath(path)) !== undefined;
  }
}

/** Parse KV3 text and wrap it in a {@link PropertyStore}. */
export function createPropertyStore(text: string): PropertyStore {
  return new PropertyStore(parseKv3(text));
}
