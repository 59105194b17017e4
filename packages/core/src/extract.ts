/**
 * Per-document collision extraction.
 *
 * Reads every hull and mesh of the first physics part, keeps the ones whose
 * collision attribute resolves to the wanted group, and triangulates them.
 * Malformed entries are skipped one at a time and reported as outcomes, so
 * a bad hull never costs the rest of the document.
 */

import { resolveDefaultIndices, DEFAULT_COLLISION_GROUP } from "./attributes.js";
import {
  BlobDecodeError,
  decodeBlob,
  toHalfEdges,
  toVector3s,
  type BlobKind,
  type DecodedBlob,
  type TailPolicy,
} from "./blob.js";
import { enumerate } from "./enumerate.js";
import { triangulateHull, type HullTriangulation } from "./hull.js";
import { triangulateMesh, type MeshTriangulation } from "./mesh.js";
import type { PropertyStore, Triangle } from "./types.js";

export type ShapeKind = "hull" | "mesh";

export type TriangulationDiagnostics =
  | Omit<HullTriangulation, "triangles">
  | Omit<MeshTriangulation, "triangles">;

export type SkipReason =
  | "missing-field"
  | "empty-blob"
  | "malformed-blob"
  | "invalid-attribute-index";

export interface ExtractedEntry {
  status: "extracted";
  kind: ShapeKind;
  index: number;
  attributeIndex: number;
  triangles: number;
  diagnostics: TriangulationDiagnostics;
}

export interface FilteredEntry {
  status: "filtered";
  kind: ShapeKind;
  index: number;
  attributeIndex: number;
}

export interface SkippedEntry {
  status: "skipped";
  kind: ShapeKind;
  index: number;
  reason: SkipReason;
  /** Property the skip was decided on. */
  field: string;
  detail?: string;
}

/** What happened to one hull or mesh entry. */
export type EntryOutcome = ExtractedEntry | FilteredEntry | SkippedEntry;

export interface ShapeSummary {
  /** Entries present in the document. */
  total: number;
  extracted: number;
  filtered: number;
  skipped: number;
}

export interface ExtractionResult {
  triangles: Triangle[];
  acceptedAttributes: number[];
  hulls: ShapeSummary;
  meshes: ShapeSummary;
  entries: EntryOutcome[];
}

export interface ExtractOptions {
  /** Collision group to keep. */
  group?: string;
  /** Step cap for each hull face loop. */
  maxFaceEdges?: number;
  /** Handling of blob bytes that do not fill a whole element. */
  tail?: TailPolicy;
}

const SHAPE_ROOT = "m_parts[0].m_rnShape";

export function hullPath(index: number, field = "m_nCollisionAttributeIndex"): string {
  return `${SHAPE_ROOT}.m_hulls[${index}].${field}`;
}

export function meshPath(index: number, field = "m_nCollisionAttributeIndex"): string {
  return `${SHAPE_ROOT}.m_meshes[${index}].${field}`;
}

/** Parse a leading integer the way `atoi` would; `undefined` if there is none. */
export function parseAttributeIndex(text: string): number | undefined {
  const match = /^\s*([+-]?\d+)/.exec(text);
  if (!match || match[1] === undefined) return undefined;
  return Number.parseInt(match[1], 10);
}

type FieldRead<K extends BlobKind> =
  | { ok: true; blob: DecodedBlob<K> }
  | { ok: false; reason: SkipReason; detail?: string };

function readField<K extends BlobKind>(
  value: string | undefined,
  kind: K,
  tail: TailPolicy,
): FieldRead<K> {
  if (value === undefined) return { ok: false, reason: "missing-field" };
  if (value === "") return { ok: false, reason: "empty-blob" };

  let blob: DecodedBlob<K>;
  try {
    blob = decodeBlob(value, kind, { tail });
  } catch (err) {
    if (err instanceof BlobDecodeError) {
      return { ok: false, reason: "malformed-blob", detail: err.message };
    }
    throw err;
  }

  if (blob.values.length === 0) return { ok: false, reason: "empty-blob" };
  return { ok: true, blob };
}

type ShapeRead =
  | { ok: true; triangles: Triangle[]; diagnostics: TriangulationDiagnostics }
  | { ok: false; reason: SkipReason; field: string; detail?: string };

function readHull(store: PropertyStore, index: number, options: ExtractOptions): ShapeRead {
  const tail = options.tail ?? "truncate";

  // Newer documents keep vertices in m_VertexPositions; older ones in m_Vertices.
  let vertexField = "m_Hull.m_VertexPositions";
  let vertexText = store.get(hullPath(index, vertexField));
  if (vertexText === undefined || vertexText === "") {
    vertexField = "m_Hull.m_Vertices";
    vertexText = store.get(hullPath(index, vertexField));
  }

  const vertices = readField(vertexText, "f32", tail);
  if (!vertices.ok) return { ...vertices, field: vertexField };
  const points = toVector3s(vertices.blob.values);
  if (points.length === 0) return { ok: false, reason: "empty-blob", field: vertexField };

  const faces = readField(store.get(hullPath(index, "m_Hull.m_Faces")), "u8", tail);
  if (!faces.ok) return { ...faces, field: "m_Hull.m_Faces" };

  const edgeBytes = readField(store.get(hullPath(index, "m_Hull.m_Edges")), "u8", tail);
  if (!edgeBytes.ok) return { ...edgeBytes, field: "m_Hull.m_Edges" };
  const edges = toHalfEdges(edgeBytes.blob.values);
  if (edges.length === 0) return { ok: false, reason: "empty-blob", field: "m_Hull.m_Edges" };

  const { triangles, ...diagnostics } = triangulateHull(points, faces.blob.values, edges, {
    maxFaceEdges: options.maxFaceEdges,
  });
  return { ok: true, triangles, diagnostics };
}

function readMesh(store: PropertyStore, index: number, options: ExtractOptions): ShapeRead {
  const tail = options.tail ?? "truncate";

  const indices = readField(store.get(meshPath(index, "m_Mesh.m_Triangles")), "i32", tail);
  if (!indices.ok) return { ...indices, field: "m_Mesh.m_Triangles" };

  const vertices = readField(store.get(meshPath(index, "m_Mesh.m_Vertices")), "f32", tail);
  if (!vertices.ok) return { ...vertices, field: "m_Mesh.m_Vertices" };
  const points = toVector3s(vertices.blob.values);
  if (points.length === 0) return { ok: false, reason: "empty-blob", field: "m_Mesh.m_Vertices" };

  const { triangles, ...diagnostics } = triangulateMesh(points, indices.blob.values);
  return { ok: true, triangles, diagnostics };
}

function emptySummary(): ShapeSummary {
  return { total: 0, extracted: 0, filtered: 0, skipped: 0 };
}

function scanShapes(
  store: PropertyStore,
  kind: ShapeKind,
  accepted: ReadonlySet<number>,
  options: ExtractOptions,
  triangles: Triangle[],
  entries: EntryOutcome[],
): ShapeSummary {
  const summary = emptySummary();
  const pathOf = kind === "hull" ? hullPath : meshPath;
  const read = kind === "hull" ? readHull : readMesh;

  for (const { index, value } of enumerate(store, (i) => pathOf(i))) {
    summary.total++;

    const attributeIndex = parseAttributeIndex(value);
    if (attributeIndex === undefined) {
      summary.skipped++;
      entries.push({
        status: "skipped",
        kind,
        index,
        reason: "invalid-attribute-index",
        field: "m_nCollisionAttributeIndex",
        detail: `not an integer: ${value}`,
      });
      continue;
    }

    if (!accepted.has(attributeIndex)) {
      summary.filtered++;
      entries.push({ status: "filtered", kind, index, attributeIndex });
      continue;
    }

    const shape = read(store, index, options);
    if (!shape.ok) {
      summary.skipped++;
      const skipped: SkippedEntry = {
        status: "skipped",
        kind,
        index,
        reason: shape.reason,
        field: shape.field,
      };
      if (shape.detail !== undefined) skipped.detail = shape.detail;
      entries.push(skipped);
      continue;
    }

    for (const triangle of shape.triangles) triangles.push(triangle);
    summary.extracted++;
    entries.push({
      status: "extracted",
      kind,
      index,
      attributeIndex,
      triangles: shape.triangles.length,
      diagnostics: shape.diagnostics,
    });
  }

  return summary;
}

/**
 * Extract the collision triangles of one document.
 *
 * Hull triangles come first, then mesh triangles, each in document order.
 */
export function extractCollision(
  store: PropertyStore,
  options: ExtractOptions = {},
): ExtractionResult {
  const accepted = resolveDefaultIndices(store, options.group ?? DEFAULT_COLLISION_GROUP);
  const triangles: Triangle[] = [];
  const entries: EntryOutcome[] = [];

  const hulls = scanShapes(store, "hull", accepted, options, triangles, entries);
  const meshes = scanShapes(store, "mesh", accepted, options, triangles, entries);

  return {
    triangles,
    acceptedAttributes: [...accepted].sort((a, b) => a - b),
    hulls,
    meshes,
    entries,
  };
}
