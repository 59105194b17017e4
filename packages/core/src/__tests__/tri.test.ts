import { describe, it, expect } from "vitest";
import {
  TriFormatError,
  computeTriangleStats,
  parseTri,
  toStlBytes,
  toTriBytes,
  triangleNormal,
  type Triangle,
} from "../index.js";

const UNIT: Triangle = {
  p1: { x: 0, y: 0, z: 0 },
  p2: { x: 1, y: 0, z: 0 },
  p3: { x: 0, y: 1, z: 0 },
};

const RAISED: Triangle = {
  p1: { x: 0, y: 0, z: 2 },
  p2: { x: 0, y: 4, z: 2 },
  p3: { x: -3, y: 0, z: 2 },
};

describe(".tri encoding", () => {
  it("writes 36 bytes per triangle with no header", () => {
    const bytes = toTriBytes([UNIT, RAISED]);
    expect(bytes).toHaveLength(72);

    const view = new DataView(bytes.buffer);
    // p2.x of the first triangle
    expect(view.getFloat32(12, true)).toBe(1);
    // p3.x of the second triangle
    expect(view.getFloat32(36 + 24, true)).toBe(-3);
  });

  it("writes nothing for no triangles", () => {
    expect(toTriBytes([])).toHaveLength(0);
  });

  it("reads back what it wrote", () => {
    expect(parseTri(toTriBytes([UNIT, RAISED]))).toEqual([UNIT, RAISED]);
  });

  it("reads from a view into a larger buffer", () => {
    const padded = new Uint8Array(40);
    padded.set(toTriBytes([RAISED]), 4);
    expect(parseTri(padded.subarray(4))).toEqual([RAISED]);
  });

  it("rejects a length that is not a whole number of triangles", () => {
    expect(() => parseTri(new Uint8Array(37))).toThrow(TriFormatError);
    expect(() => parseTri(new Uint8Array(37))).toThrow(
      "Invalid .tri: 37 bytes is not a multiple of 36",
    );
  });
});

describe("STL export", () => {
  it("writes header, count, normal and vertices", () => {
    const bytes = toStlBytes([UNIT], "crate");
    expect(bytes).toHaveLength(84 + 50);

    const view = new DataView(bytes.buffer);
    expect(String.fromCharCode(...bytes.subarray(0, 5))).toBe("crate");
    expect(bytes[5]).toBe(0x20);
    expect(view.getUint32(80, true)).toBe(1);
    // normal = +Z
    expect(view.getFloat32(84 + 8, true)).toBe(1);
    // p2.x
    expect(view.getFloat32(84 + 24, true)).toBe(1);
    expect(view.getUint16(84 + 48, true)).toBe(0);
  });

  it("uses a zero normal for degenerate triangles", () => {
    const flat: Triangle = { p1: UNIT.p1, p2: UNIT.p1, p3: UNIT.p2 };
    expect(triangleNormal(flat)).toEqual({ x: 0, y: 0, z: 0 });
    expect(triangleNormal(RAISED).z).toBe(1);
  });
});

describe("computeTriangleStats", () => {
  it("summarizes bounds, area and degenerates", () => {
    const flat: Triangle = { p1: UNIT.p1, p2: UNIT.p2, p3: UNIT.p2 };
    const stats = computeTriangleStats([UNIT, RAISED, flat]);

    expect(stats.triangleCount).toBe(3);
    expect(stats.bounds).toEqual({
      min: { x: -3, y: 0, z: 0 },
      max: { x: 1, y: 4, z: 2 },
    });
    expect(stats.surfaceArea).toBe(6.5);
    expect(stats.degenerateCount).toBe(1);
  });

  it("has no bounds for an empty soup", () => {
    expect(computeTriangleStats([])).toEqual({
      triangleCount: 0,
      bounds: null,
      surfaceArea: 0,
      degenerateCount: 0,
    });
  });
});
