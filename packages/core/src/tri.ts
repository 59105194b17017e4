/**
 * `.tri` and binary STL encoding.
 *
 * A `.tri` file is nothing but triangles: 9 little-endian f32 per triangle
 * (p1, p2, p3), 36 bytes each, no header or count.
 */

import type { Triangle, Vector3 } from "./types.js";

export const TRIANGLE_BYTES = 36;

/** Error thrown when bytes cannot be read as a triangle file. */
export class TriFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TriFormatError";
  }
}

function writeVector(view: DataView, offset: number, v: Vector3): number {
  view.setFloat32(offset, v.x, true);
  view.setFloat32(offset + 4, v.y, true);
  view.setFloat32(offset + 8, v.z, true);
  return offset + 12;
}

function readVector(view: DataView, offset: number): Vector3 {
  return {
    x: view.getFloat32(offset, true),
    y: view.getFloat32(offset + 4, true),
    z: view.getFloat32(offset + 8, true),
  };
}

/** Encode triangles as `.tri` bytes. */
export function toTriBytes(triangles: readonly Triangle[]): Uint8Array {
  const buffer = new ArrayBuffer(triangles.length * TRIANGLE_BYTES);
  const view = new DataView(buffer);

  let offset = 0;
  for (const triangle of triangles) {
    offset = writeVector(view, offset, triangle.p1);
    offset = writeVector(view, offset, triangle.p2);
    offset = writeVector(view, offset, triangle.p3);
  }

  return new Uint8Array(buffer);
}

/** Decode `.tri` bytes. The length must be a whole number of triangles. */
export function parseTri(bytes: Uint8Array): Triangle[] {
  if (bytes.byteLength % TRIANGLE_BYTES !== 0) {
    throw new TriFormatError(
      `Invalid .tri: ${bytes.byteLength} bytes is not a multiple of ${TRIANGLE_BYTES}`,
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const triangles: Triangle[] = [];
  for (let offset = 0; offset < bytes.byteLength; offset += TRIANGLE_BYTES) {
    triangles.push({
      p1: readVector(view, offset),
      p2: readVector(view, offset + 12),
      p3: readVector(view, offset + 24),
    });
  }
  return triangles;
}

/** Unit normal of a triangle, or the zero vector when it is degenerate. */
export function triangleNormal(triangle: Triangle): Vector3 {
  const { p1, p2, p3 } = triangle;
  const e1x = p2.x - p1.x;
  const e1y = p2.y - p1.y;
  const e1z = p2.z - p1.z;
  const e2x = p3.x - p1.x;
  const e2y = p3.y - p1.y;
  const e2z = p3.z - p1.z;

  const nx = e1y * e2z - e1z * e2y;
  const ny = e1z * e2x - e1x * e2z;
  const nz = e1x * e2y - e1y * e2x;

  const len = Math.sqrt(nx * nx + ny * ny + nz * nz);
  if (len <= 1e-10) return { x: 0, y: 0, z: 0 };
  return { x: nx / len, y: ny / len, z: nz / len };
}

/**
 * Encode triangles as binary STL:
 * - 80 byte header (name, space padded)
 * - uint32 triangle count
 * - per triangle: normal, three vertices, uint16 attribute (0)
 */
export function toStlBytes(triangles: readonly Triangle[], name: string): Uint8Array {
  const buffer = new ArrayBuffer(84 + triangles.length * 50);
  const view = new DataView(buffer);
  const uint8 = new Uint8Array(buffer);

  const header = name.slice(0, 80).padEnd(80, " ");
  for (let i = 0; i < 80; i++) {
    uint8[i] = header.charCodeAt(i) & 0xff;
  }
  view.setUint32(80, triangles.length, true);

  let offset = 84;
  for (const triangle of triangles) {
    offset = writeVector(view, offset, triangleNormal(triangle));
    offset = writeVector(view, offset, triangle.p1);
    offset = writeVector(view, offset, triangle.p2);
    offset = writeVector(view, offset, triangle.p3);
    view.setUint16(offset, 0, true);
    offset += 2;
  }

  return uint8;
}
