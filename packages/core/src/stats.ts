/**
 * Summary figures for a triangle soup.
 */

import type { Triangle, Vector3 } from "./types.js";

export interface BoundingBox {
  min: Vector3;
  max: Vector3;
}

export interface TriangleStats {
  triangleCount: number;
  /** `null` when there are no triangles. */
  bounds: BoundingBox | null;
  surfaceArea: number;
  /** Triangles with (near) zero area. */
  degenerateCount: number;
}

/** Area of one triangle: half the cross product's length. */
export function triangleArea(triangle: Triangle): number {
  const { p1, p2, p3 } = triangle;
  const ax = p2.x - p1.x;
  const ay = p2.y - p1.y;
  const az = p2.z - p1.z;
  const bx = p3.x - p1.x;
  const by = p3.y - p1.y;
  const bz = p3.z - p1.z;

  const cx = ay * bz - az * by;
  const cy = az * bx - ax * bz;
  const cz = ax * by - ay * bx;
  return Math.sqrt(cx * cx + cy * cy + cz * cz) / 2;
}

export function computeBounds(triangles: readonly Triangle[]): BoundingBox | null {
  if (triangles.length === 0) return null;

  const min = { x: Infinity, y: Infinity, z: Infinity };
  const max = { x: -Infinity, y: -Infinity, z: -Infinity };
  for (const { p1, p2, p3 } of triangles) {
    for (const p of [p1, p2, p3]) {
      min.x = Math.min(min.x, p.x);
      min.y = Math.min(min.y, p.y);
      min.z = Math.min(min.z, p.z);
      max.x = Math.max(max.x, p.x);
      max.y = Math.max(max.y, p.y);
      max.z = Math.max(max.z, p.z);
    }
  }
  return { min, max };
}

export function computeTriangleStats(
  triangles: readonly Triangle[],
  epsilon = 1e-9,
): TriangleStats {
  let surfaceArea = 0;
  let degenerateCount = 0;

  for (const triangle of triangles) {
    const area = triangleArea(triangle);
    surfaceArea += area;
    if (area <= epsilon) degenerateCount++;
  }

  return {
    triangleCount: triangles.length,
    bounds: computeBounds(triangles),
    surfaceArea,
    degenerateCount,
  };
}
