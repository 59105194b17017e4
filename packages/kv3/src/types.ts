/** A parsed KV3 value. */
export type Kv3Value = Kv3Object | Kv3Array | Kv3Scalar | Kv3Blob;

/** `{ key = value ... }` — keys keep their source order. */
export interface Kv3Object {
  type: "object";
  entries: Map<string, Kv3Value>;
}

/** `[ value, value, ]` */
export interface Kv3Array {
  type: "array";
  items: Kv3Value[];
}

/**
 * Any leaf that is not a blob: numbers, booleans, null, identifiers,
 * strings and flagged values (`resource:"..."`).
 */
export interface Kv3Scalar {
  type: "scalar";
  /** Source text of the value. Strings keep their quotes. */
  raw: string;
}

/** `#[ 00 01 ... ]` */
export interface Kv3Blob {
  type: "blob";
  /** Hex tokens as written, each followed by a single space. */
  hex: string;
}

/** A parsed document: the `<!-- kv3 ... -->` header line, if any, plus the root value. */
export interface Kv3Document {
  header?: string;
  root: Kv3Value;
}

/** One step of a property path: a field name or an array index. */
export type PathSegment =
  | { type: "key"; name: string }
  | { type: "index"; index: number };

/** Error thrown when KV3 text cannot be parsed. */
export class Kv3ParseError extends Error {
  line: number;
  column: number;

  constructor(line: number, column: number, message: string) {
    super(`line ${line}, column ${column}: ${message}`);
    this.name = "Kv3ParseError";
    this.line = line;
    this.column = column;
  }
}
