/**
 * Text KV3 parser.
 *
 * Handles the subset of the format that physics documents use:
 *
 *   <!-- kv3 encoding:text:version{...} format:vphys:version{...} -->
 *   {
 *     m_nFlags = 0
 *     m_name = "hull"
 *     m_list = [ 1, 2, 3, ]
 *     m_blob = #[ 00 00 80 3F ]
 *     m_model = resource:"models/crate.vmdl"
 *   }
 *
 * plus `//` and `/* *\/` comments and `"""` multi-line strings.
 */

import {
  Kv3ParseError,
  type Kv3Document,
  type Kv3Object,
  type Kv3Value,
} from "./types.js";

const DELIMITERS = new Set(["{", "}", "[", "]", "=", ",", '"']);

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function isIdentifierChar(ch: string): boolean {
  return /[A-Za-z0-9_.\-+:]/.test(ch);
}

class Cursor {
  pos = 0;
  line = 1;
  column = 1;

  constructor(readonly text: string) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(offset = 0): string {
    return this.text.charAt(this.pos + offset);
  }

  startsWith(token: string): boolean {
    return this.text.startsWith(token, this.pos);
  }

  advance(count = 1): void {
    for (let i = 0; i < count && this.pos < this.text.length; i++) {
      if (this.text.charAt(this.pos) === "\n") {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.pos++;
    }
  }

  error(message: string): Kv3ParseError {
    return new Kv3ParseError(this.line, this.column, message);
  }

  expect(token: string): void {
    if (!this.startsWith(token)) {
      const found = this.done ? "end of input" : `'${this.peek()}'`;
      throw this.error(`expected '${token}', found ${found}`);
    }
    this.advance(token.length);
  }

  /** Skip whitespace and comments. */
  skipTrivia(): void {
    while (!this.done) {
      const ch = this.peek();
      if (isWhitespace(ch)) {
        this.advance();
      } else if (this.startsWith("//")) {
        while (!this.done && this.peek() !== "\n") this.advance();
      } else if (this.startsWith("/*")) {
        const end = this.text.indexOf("*/", this.pos + 2);
        if (end === -1) throw this.error("unterminated block comment");
        this.advance(end + 2 - this.pos);
      } else {
        return;
      }
    }
  }
}

/** Parse KV3 text into a document tree. */
export function parseKv3(text: string): Kv3Document {
  const cursor = new Cursor(text);
  cursor.skipTrivia();

  let header: string | undefined;
  if (cursor.startsWith("<!--")) {
    const end = text.indexOf("-->", cursor.pos);
    if (end === -1) throw cursor.error("unterminated header");
    header = text.slice(cursor.pos + 4, end).trim();
    cursor.advance(end + 3 - cursor.pos);
    cursor.skipTrivia();
  }

  if (cursor.done) throw cursor.error("document has no root value");

  const root = parseValue(cursor);
  cursor.skipTrivia();
  if (!cursor.done) {
    throw cursor.error(`unexpected '${cursor.peek()}' after root value`);
  }

  return header === undefined ? { root } : { header, root };
}

function parseValue(cursor: Cursor): Kv3Value {
  cursor.skipTrivia();
  const ch = cursor.peek();

  if (ch === "{") return parseObject(cursor);
  if (ch === "[") return parseArray(cursor);
  if (cursor.startsWith("#[")) return parseBlob(cursor);
  if (ch === '"') return { type: "scalar", raw: readString(cursor) };
  if (cursor.done) throw cursor.error("expected a value, found end of input");
  if (DELIMITERS.has(ch)) throw cursor.error(`expected a value, found '${ch}'`);

  return { type: "scalar", raw: readBareValue(cursor) };
}

function parseObject(cursor: Cursor): Kv3Object {
  cursor.expect("{");
  const entries = new Map<string, Kv3Value>();

  for (;;) {
    cursor.skipTrivia();
    if (cursor.peek() === "}") {
      cursor.advance();
      return { type: "object", entries };
    }
    if (cursor.done) throw cursor.error("unterminated object");

    const key = readKey(cursor);
    cursor.skipTrivia();
    cursor.expect("=");
    entries.set(key, parseValue(cursor));

    cursor.skipTrivia();
    if (cursor.peek() === ",") cursor.advance();
  }
}

function parseArray(cursor: Cursor): Kv3Value {
  cursor.expect("[");
  const items: Kv3Value[] = [];

  for (;;) {
    cursor.skipTrivia();
    if (cursor.peek() === "]") {
      cursor.advance();
      return { type: "array", items };
    }
    if (cursor.done) throw cursor.error("unterminated array");

    items.push(parseValue(cursor));

    cursor.skipTrivia();
    if (cursor.done) throw cursor.error("unterminated array");
    if (cursor.peek() === ",") {
      cursor.advance();
    } else if (cursor.peek() !== "]") {
      throw cursor.error(`expected ',' or ']' in array, found '${cursor.peek()}'`);
    }
  }
}

function parseBlob(cursor: Cursor): Kv3Value {
  cursor.expect("#[");
  const end = cursor.text.indexOf("]", cursor.pos);
  if (end === -1) throw cursor.error("unterminated binary blob");

  const body = cursor.text.slice(cursor.pos, end);
  cursor.advance(end + 1 - cursor.pos);

  const tokens = body.split(/\s+/).filter((token) => token.length > 0);
  return { type: "blob", hex: tokens.map((token) => `${token} `).join("") };
}

function readKey(cursor: Cursor): string {
  if (cursor.peek() === '"') {
    const raw = readString(cursor);
    return raw.slice(1, -1);
  }

  const start = cursor.pos;
  while (!cursor.done && isIdentifierChar(cursor.peek()) && cursor.peek() !== ":") {
    cursor.advance();
  }
  if (cursor.pos === start) {
    throw cursor.error(`expected a key, found '${cursor.peek()}'`);
  }
  return cursor.text.slice(start, cursor.pos);
}

/** Read a quoted string and return its source text, quotes included. */
function readString(cursor: Cursor): string {
  const start = cursor.pos;

  if (cursor.startsWith('"""')) {
    const end = cursor.text.indexOf('"""', cursor.pos + 3);
    if (end === -1) throw cursor.error("unterminated multi-line string");
    cursor.advance(end + 3 - cursor.pos);
    return cursor.text.slice(start, cursor.pos);
  }

  cursor.advance();
  for (;;) {
    if (cursor.done) throw cursor.error("unterminated string");
    const ch = cursor.peek();
    if (ch === "\\") {
      cursor.advance(2);
    } else if (ch === '"') {
      cursor.advance();
      return cursor.text.slice(start, cursor.pos);
    } else if (ch === "\n") {
      throw cursor.error("newline in string");
    } else {
      cursor.advance();
    }
  }
}

/** Numbers, keywords and flagged values such as `resource:"path"`. */
function readBareValue(cursor: Cursor): string {
  const start = cursor.pos;
  while (!cursor.done && isIdentifierChar(cursor.peek())) {
    if (cursor.peek() === ":" && cursor.peek(1) === '"') {
      cursor.advance();
      readString(cursor);
      return cursor.text.slice(start, cursor.pos);
    }
    cursor.advance();
  }
  if (cursor.pos === start) {
    throw cursor.error(`unexpected '${cursor.peek()}'`);
  }
  return cursor.text.slice(start, cursor.pos);
}
