/**
 * Convex hull triangulation from packed half-edge data.
 *
 * Each face stores the index of one half-edge on its boundary. Walking
 * `next` from there visits the face loop, and each step before the loop
 * closes emits a triangle fanned from the start half-edge's origin vertex:
 * n - 2 triangles for an n-sided face. Hull faces are convex and planar,
 * so the fan covers each face exactly.
 *
 * All indices come straight from u8 blobs and are checked before use.
 */

import type { HalfEdgeRecord, Triangle, Vector3 } from "./types.js";

/** Steps allowed per face loop before the walk gives up. */
export const DEFAULT_MAX_FACE_EDGES = 100;

export interface HullOptions {
  maxFaceEdges?: number;
}

export interface HullTriangulation {
  triangles: Triangle[];
  /** Faces whose start half-edge is out of range. */
  skippedFaces: number;
  /** Loops abandoned at an out-of-range `next`. */
  brokenLoops: number;
  /** Loops cut off by the step cap without closing. */
  truncatedLoops: number;
  /** Fan steps that referenced a missing vertex. */
  droppedTriangles: number;
}

export function triangulateHull(
  vertices: readonly Vector3[],
  faces: ArrayLike<number>,
  edges: readonly HalfEdgeRecord[],
  options: HullOptions = {},
): HullTriangulation {
  const maxSteps = options.maxFaceEdges ?? DEFAULT_MAX_FACE_EDGES;
  const result: HullTriangulation = {
    triangles: [],
    skippedFaces: 0,
    brokenLoops: 0,
    truncatedLoops: 0,
    droppedTriangles: 0,
  };

  for (let f = 0; f < faces.length; f++) {
    const start = faces[f];
    const startEdge = start === undefined ? undefined : edges[start];
    if (start === undefined || startEdge === undefined) {
      result.skippedFaces++;
      continue;
    }

    const anchor = vertices[startEdge.origin];
    let edge = startEdge.next;
    let steps = 0;

    for (;;) {
      // The closing half-edge ends back at the anchor and adds no area.
      if (edge === start) break;
      if (steps >= maxSteps) {
        result.truncatedLoops++;
        break;
      }

      const current: HalfEdgeRecord | undefined = edges[edge];
      if (current === undefined) {
        result.brokenLoops++;
        break;
      }
      const nextEdge: number = current.next;
      if (nextEdge === start) break;
      const following = edges[nextEdge];
      if (following === undefined) {
        result.brokenLoops++;
        break;
      }

      const p2 = vertices[current.origin];
      const p3 = vertices[following.origin];
      if (anchor !== undefined && p2 !== undefined && p3 !== undefined) {
        result.triangles.push({ p1: anchor, p2, p3 });
      } else {
        result.droppedTriangles++;
      }

      edge = nextEdge;
      steps++;
    }
  }

  return result;
}
