import { describe, it, expect } from "vitest";
import { triangulateMesh } from "../index.js";
import { SQUARE } from "./fixtures.js";

describe("triangulateMesh", () => {
  it("builds one triangle per index triple", () => {
    const result = triangulateMesh(SQUARE, [0, 1, 2, 0, 2, 3]);
    expect(result.triangles).toEqual([
      { p1: SQUARE[0], p2: SQUARE[1], p3: SQUARE[2] },
      { p1: SQUARE[0], p2: SQUARE[2], p3: SQUARE[3] },
    ]);
    expect(result.droppedTriangles).toBe(0);
    expect(result.trailingIndices).toBe(0);
  });

  it("rejects a triple with an index past the vertex array", () => {
    const result = triangulateMesh(SQUARE, [0, 1, 2, 5, 1, 2]);
    expect(result.triangles).toEqual([{ p1: SQUARE[0], p2: SQUARE[1], p3: SQUARE[2] }]);
    expect(result.droppedTriangles).toBe(1);
  });

  it("rejects negative indices", () => {
    const result = triangulateMesh(SQUARE, new Int32Array([-1, 1, 2]));
    expect(result.triangles).toHaveLength(0);
    expect(result.droppedTriangles).toBe(1);
  });

  it("leaves a partial trailing triple unconsumed", () => {
    const result = triangulateMesh(SQUARE, [0, 1, 2, 3, 0]);
    expect(result.triangles).toHaveLength(1);
    expect(result.trailingIndices).toBe(2);
  });

  it("returns nothing for empty input", () => {
    expect(triangulateMesh([], [0, 1, 2]).triangles).toHaveLength(0);
    expect(triangulateMesh(SQUARE, []).triangles).toHaveLength(0);
  });
});
