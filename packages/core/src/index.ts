/**
 * @vphys/core — collision geometry reconstruction for vphys documents.
 *
 * Decodes packed blobs, resolves the default collision group, triangulates
 * hulls (half-edge) and meshes (indexed), and encodes the result as `.tri`.
 */

export type { Vector3, Triangle, HalfEdgeRecord, PropertyStore } from "./types.js";

export {
  BlobDecodeError,
  ELEMENT_SIZE,
  decodeHex,
  decodeBlob,
  reinterpretBytes,
  toVector3s,
  toHalfEdges,
} from "./blob.js";
export type { BlobKind, DecodeOptions, DecodedBlob, TailPolicy } from "./blob.js";

export { enumerate } from "./enumerate.js";
export type { IndexedValue } from "./enumerate.js";

export {
  DEFAULT_COLLISION_GROUP,
  cleanCollisionGroup,
  collisionGroupPath,
  resolveDefaultIndices,
} from "./attributes.js";

export { DEFAULT_MAX_FACE_EDGES, triangulateHull } from "./hull.js";
export type { HullOptions, HullTriangulation } from "./hull.js";

export { triangulateMesh } from "./mesh.js";
export type { MeshTriangulation } from "./mesh.js";

export { extractCollision, hullPath, meshPath, parseAttributeIndex } from "./extract.js";
export type {
  EntryOutcome,
  ExtractedEntry,
  ExtractOptions,
  ExtractionResult,
  FilteredEntry,
  ShapeKind,
  ShapeSummary,
  SkipReason,
  SkippedEntry,
  TriangulationDiagnostics,
} from "./extract.js";

export { TRIANGLE_BYTES, TriFormatError, parseTri, toStlBytes, toTriBytes, triangleNormal } from "./tri.js";

export { computeBounds, computeTriangleStats, triangleArea } from "./stats.js";
export type { BoundingBox, TriangleStats } from "./stats.js";
