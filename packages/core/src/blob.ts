/**
 * Hex blob decoding.
 *
 * vphys documents store packed arrays as `#[ AA BB CC ]` blobs, which the
 * property store hands back as `"AA BB CC "`: two hex digits per byte, each
 * followed by a space. Bytes are little-endian.
 */

import type { HalfEdgeRecord, Vector3 } from "./types.js";

/** Element types a blob can be reinterpreted as. */
export type BlobKind = "f32" | "u8" | "i32";

interface BlobArrays {
  f32: Float32Array;
  u8: Uint8Array;
  i32: Int32Array;
}

export const ELEMENT_SIZE: Record<BlobKind, number> = {
  f32: 4,
  u8: 1,
  i32: 4,
};

/**
 * What to do with bytes left over after the last whole element.
 * - `truncate`: drop them and report the count on the result
 * - `reject`: throw {@link BlobDecodeError}
 */
export type TailPolicy = "truncate" | "reject";

export interface DecodeOptions {
  tail?: TailPolicy;
}

export interface DecodedBlob<K extends BlobKind> {
  kind: K;
  values: BlobArrays[K];
  /** Bytes dropped after the last whole element. */
  trailingBytes: number;
}

/** Error thrown when blob text is not valid hex or does not fit its element type. */
export class BlobDecodeError extends Error {
  /** Character offset into the blob text, or byte offset for tail errors. */
  offset: number;

  constructor(offset: number, message: string) {
    super(`offset ${offset}: ${message}`);
    this.name = "BlobDecodeError";
    this.offset = offset;
  }
}

function hexValue(code: number): number {
  // 0-9
  if (code >= 0x30 && code <= 0x39) return code - 0x30;
  // A-F
  if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10;
  // a-f
  if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10;
  return -1;
}

/**
 * Decode space-separated hex pairs into bytes.
 *
 * Spaces are skipped wherever they appear; every other character must be a
 * hex digit and digits must pair up.
 */
export function decodeHex(text: string): Uint8Array {
  const bytes = new Uint8Array(Math.ceil(text.length / 2));
  let count = 0;
  let i = 0;

  while (i < text.length) {
    if (text.charCodeAt(i) === 0x20) {
      i++;
      continue;
    }

    const high = hexValue(text.charCodeAt(i));
    if (high < 0) {
      throw new BlobDecodeError(i, `invalid hex digit '${text.charAt(i)}'`);
    }
    if (i + 1 >= text.length || text.charCodeAt(i + 1) === 0x20) {
      throw new BlobDecodeError(i, "unpaired hex digit");
    }
    const low = hexValue(text.charCodeAt(i + 1));
    if (low < 0) {
      throw new BlobDecodeError(i + 1, `invalid hex digit '${text.charAt(i + 1)}'`);
    }

    bytes[count++] = (high << 4) | low;
    i += 2;
  }

  return bytes.slice(0, count);
}

/** Reinterpret bytes as little-endian elements of `kind`. */
export function reinterpretBytes<K extends BlobKind>(
  bytes: Uint8Array,
  kind: K,
  options: DecodeOptions = {},
): DecodedBlob<K> {
  const size = ELEMENT_SIZE[kind];
  const length = Math.floor(bytes.length / size);
  const trailingBytes = bytes.length - length * size;

  if (trailingBytes > 0 && options.tail === "reject") {
    throw new BlobDecodeError(
      length * size,
      `${bytes.length} bytes is not a multiple of the ${size}-byte ${kind} element`,
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const values = allocate(kind, length);
  const target: Float32Array | Uint8Array | Int32Array = values;
  for (let i = 0; i < length; i++) {
    target[i] = readElement(view, kind, i * size);
  }

  return { kind, values, trailingBytes };
}

/** Decode blob text straight to typed elements. */
export function decodeBlob<K extends BlobKind>(
  text: string,
  kind: K,
  options: DecodeOptions = {},
): DecodedBlob<K> {
  return reinterpretBytes(decodeHex(text), kind, options);
}

function allocate<K extends BlobKind>(kind: K, length: number): BlobArrays[K];
function allocate(kind: BlobKind, length: number): BlobArrays[BlobKind] {
  switch (kind) {
    case "f32":
      return new Float32Array(length);
    case "u8":
      return new Uint8Array(length);
    case "i32":
      return new Int32Array(length);
  }
}

function readElement(view: DataView, kind: BlobKind, offset: number): number {
  switch (kind) {
    case "f32":
      return view.getFloat32(offset, true);
    case "u8":
      return view.getUint8(offset);
    case "i32":
      return view.getInt32(offset, true);
  }
}

/** Group floats into points. A partial trailing triple is dropped. */
export function toVector3s(floats: ArrayLike<number>): Vector3[] {
  const points: Vector3[] = [];
  for (let i = 0; i + 2 < floats.length; i += 3) {
    points.push({ x: floats[i] ?? 0, y: floats[i + 1] ?? 0, z: floats[i + 2] ?? 0 });
  }
  return points;
}

/** Group bytes into half-edge records. A partial trailing record is dropped. */
export function toHalfEdges(bytes: ArrayLike<number>): HalfEdgeRecord[] {
  const edges: HalfEdgeRecord[] = [];
  for (let i = 0; i + 3 < bytes.length; i += 4) {
    edges.push({
      next: bytes[i] ?? 0,
      twin: bytes[i + 1] ?? 0,
      origin: bytes[i + 2] ?? 0,
      face: bytes[i + 3] ?? 0,
    });
  }
  return edges;
}
