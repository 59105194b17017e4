/**
 * @vphys/kv3 — KV3 text parser and path-addressed property store.
 */

export type {
  Kv3Value,
  Kv3Object,
  Kv3Array,
  Kv3Scalar,
  Kv3Blob,
  Kv3Document,
  PathSegment,
} from "./types.js";
export { Kv3ParseError } from "./types.js";
export { parseKv3 } from "./parser.js";
export { PropertyStore, createPropertyStore, parsePath, resolvePath } from "./store.js";
