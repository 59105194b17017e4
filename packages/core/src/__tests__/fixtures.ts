/**
 * Shared test helpers: blob encoders and an in-memory property store.
 */

import type { HalfEdgeRecord, PropertyStore, Vector3 } from "../types.js";

/** Encode bytes the way the property store hands blobs back. */
export function hex(bytes: ArrayLike<number>): string {
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += `${(bytes[i] ?? 0).toString(16).padStart(2, "0").toUpperCase()} `;
  }
  return out;
}

export function f32Hex(values: number[]): string {
  const view = new DataView(new ArrayBuffer(values.length * 4));
  values.forEach((v, i) => view.setFloat32(i * 4, v, true));
  return hex(new Uint8Array(view.buffer));
}

export function i32Hex(values: number[]): string {
  const view = new DataView(new ArrayBuffer(values.length * 4));
  values.forEach((v, i) => view.setInt32(i * 4, v, true));
  return hex(new Uint8Array(view.buffer));
}

export function vertexHex(points: Vector3[]): string {
  return f32Hex(points.flatMap((p) => [p.x, p.y, p.z]));
}

export function edgeHex(edges: HalfEdgeRecord[]): string {
  return hex(edges.flatMap((e) => [e.next, e.twin, e.origin, e.face]));
}

/** Unit square in the XY plane, counter-clockwise. */
export const SQUARE: Vector3[] = [
  { x: 0, y: 0, z: 0 },
  { x: 1, y: 0, z: 0 },
  { x: 1, y: 1, z: 0 },
  { x: 0, y: 1, z: 0 },
];

/** One closed four-edge loop over {@link SQUARE}. */
export const SQUARE_LOOP: HalfEdgeRecord[] = [
  { next: 1, twin: 0, origin: 0, face: 0 },
  { next: 2, twin: 1, origin: 1, face: 0 },
  { next: 3, twin: 2, origin: 2, face: 0 },
  { next: 0, twin: 3, origin: 3, face: 0 },
];

export class MapStore implements PropertyStore {
  private values: Map<string, string>;

  constructor(values: Record<string, string>) {
    this.values = new Map(Object.entries(values));
  }

  get(path: string): string | undefined {
    return this.values.get(path);
  }
}
