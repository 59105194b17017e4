/** 3D point with f32 components, as stored in vphys blobs. */
export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/** Three corners in the winding order the source geometry produced. */
export interface Triangle {
  p1: Vector3;
  p2: Vector3;
  p3: Vector3;
}

/**
 * One packed half-edge record (4 × u8).
 *
 * Indices are raw bytes with no bounds guarantee against the arrays they
 * point into; check `next` and `origin` before indexing.
 */
export interface HalfEdgeRecord {
  /** Following half-edge in the face loop. */
  next: number;
  /** Opposing half-edge. */
  twin: number;
  /** Vertex the half-edge starts from. */
  origin: number;
  /** Owning face. */
  face: number;
}

/**
 * Read-only view of a property tree.
 *
 * `get` returns `undefined` when nothing is stored at `path`; a stored empty
 * string is returned as `""`.
 */
export interface PropertyStore {
  get(path: string): string | undefined;
}
