import type { Triangle, Vector3 } from "./types.js";

export interface MeshTriangulation {
  triangles: Triangle[];
  /** Triples with an index outside the vertex array. */
  droppedTriangles: number;
  /** Indices left over after the last whole triple. */
  trailingIndices: number;
}

/** Build triangles from a flat index list, three indices per triangle. */
export function triangulateMesh(
  vertices: readonly Vector3[],
  indices: ArrayLike<number>,
): MeshTriangulation {
  const triangles: Triangle[] = [];
  let droppedTriangles = 0;
  const whole = indices.length - (indices.length % 3);

  for (let i = 0; i < whole; i += 3) {
    const p1 = vertexAt(vertices, indices[i]);
    const p2 = vertexAt(vertices, indices[i + 1]);
    const p3 = vertexAt(vertices, indices[i + 2]);
    if (p1 && p2 && p3) {
      triangles.push({ p1, p2, p3 });
    } else {
      droppedTriangles++;
    }
  }

  return { triangles, droppedTriangles, trailingIndices: indices.length - whole };
}

function vertexAt(vertices: readonly Vector3[], index: number | undefined): Vector3 | undefined {
  if (index === undefined || !Number.isInteger(index) || index < 0) return undefined;
  return vertices[index];
}
