import { describe, it, expect } from "vitest";
import {
  Kv3ParseError,
  createPropertyStore,
  parseKv3,
  parsePath,
} from "../index.js";

const DOCUMENT = `<!-- kv3 encoding:text:version{e21c7f3c-8a33-41c5-9977-a76d3a32aa0d} format:vphys:version{0} -->
{
	m_nFlags = 0
	// collision groups
	m_collisionAttributes =
	[
		{
			m_CollisionGroupString = "Default"
			m_InteractAsStrings = [ "default", "player" ]
		},
		{
			m_CollisionGroupString = ""
		},
	]
	m_parts =
	[
		{
			m_rnShape =
			{
				m_hulls =
				[
					{
						m_nCollisionAttributeIndex = 0
						m_Hull =
						{
							m_vCentroid = [ 0.5, -1.0e-3, 2.0 ]
							m_Faces = #[
								00 04 08
							]
							m_Edges = #[ ]
						}
					},
				]
				/* no meshes in this part */
				m_meshes = [ ]
			}
			m_model = resource:"models/props/crate.vmdl"
		},
	]
	m_notes = """first line
second line"""
}
`;

describe("parsePath", () => {
  it("splits keys and indices", () => {
    expect(parsePath("m_parts[0].m_rnShape.m_hulls[12].m_Hull")).toEqual([
      { type: "key", name: "m_parts" },
      { type: "index", index: 0 },
      { type: "key", name: "m_rnShape" },
      { type: "key", name: "m_hulls" },
      { type: "index", index: 12 },
      { type: "key", name: "m_Hull" },
    ]);
  });

  it("accepts nested indices", () => {
    expect(parsePath("a[1][2]")).toEqual([
      { type: "key", name: "a" },
      { type: "index", index: 1 },
      { type: "index", index: 2 },
    ]);
  });

  it("rejects malformed paths", () => {
    expect(() => parsePath("")).toThrow("Invalid property path");
    expect(() => parsePath("a..b")).toThrow("Invalid property path");
    expect(() => parsePath("a.")).toThrow("Invalid property path");
    expect(() => parsePath("[0]")).toThrow("Invalid property path");
    expect(() => parsePath("a[x]")).toThrow("Invalid property path");
  });
});

describe("PropertyStore", () => {
  const store = createPropertyStore(DOCUMENT);

  it("reads the header", () => {
    expect(store.document.header).toBe(
      "kv3 encoding:text:version{e21c7f3c-8a33-41c5-9977-a76d3a32aa0d} format:vphys:version{0}",
    );
  });

  it("returns scalars as source text", () => {
    expect(store.get("m_nFlags")).toBe("0");
    expect(store.get("m_collisionAttributes[0].m_CollisionGroupString")).toBe('"Default"');
    expect(store.get("m_parts[0].m_rnShape.m_hulls[0].m_nCollisionAttributeIndex")).toBe("0");
    expect(store.get("m_parts[0].m_rnShape.m_hulls[0].m_Hull.m_vCentroid[1]")).toBe("-1.0e-3");
  });

  it("keeps present-but-empty strings distinct from absence", () => {
    expect(store.get("m_collisionAttributes[1].m_CollisionGroupString")).toBe('""');
    expect(store.get("m_collisionAttributes[2].m_CollisionGroupString")).toBeUndefined();
  });

  it("returns blobs as space-terminated hex bytes", () => {
    expect(store.get("m_parts[0].m_rnShape.m_hulls[0].m_Hull.m_Faces")).toBe("00 04 08 ");
    expect(store.get("m_parts[0].m_rnShape.m_hulls[0].m_Hull.m_Edges")).toBe("");
  });

  it("returns flagged values and multi-line strings verbatim", () => {
    expect(store.get("m_parts[0].m_model")).toBe('resource:"models/props/crate.vmdl"');
    expect(store.get("m_notes")).toBe('"""first line\nsecond line"""');
  });

  it("reads containers as absent", () => {
    expect(store.get("m_parts[0].m_rnShape")).toBeUndefined();
    expect(store.get("m_parts[0].m_rnShape.m_meshes")).toBeUndefined();
    expect(store.has("m_parts[0].m_rnShape.m_meshes")).toBe(true);
    expect(store.has("m_parts[0].m_rnShape.m_meshes[0]")).toBe(false);
  });

  it("treats out-of-range indices and wrong node kinds as absent", () => {
    expect(store.get("m_parts[5].m_model")).toBeUndefined();
    expect(store.get("m_nFlags[0]")).toBeUndefined();
    expect(store.get("m_parts.m_model")).toBeUndefined();
  });
});

describe("parseKv3", () => {
  it("parses a document without a header", () => {
    const doc = parseKv3("{ a = 1 b = [ true, null ] }");
    expect(doc.header).toBeUndefined();
    expect(doc.root).toEqual({
      type: "object",
      entries: new Map([
        ["a", { type: "scalar", raw: "1" }],
        [
          "b",
          {
            type: "array",
            items: [
              { type: "scalar", raw: "true" },
              { type: "scalar", raw: "null" },
            ],
          },
        ],
      ]),
    });
  });

  it("keeps escaped quotes inside strings", () => {
    const doc = parseKv3('{ s = "say \\"hi\\"" }');
    expect(doc.root).toEqual({
      type: "object",
      entries: new Map([["s", { type: "scalar", raw: '"say \\"hi\\""' }]]),
    });
  });

  it("reports the position of syntax errors", () => {
    let caught: unknown;
    try {
      parseKv3("{\n  a = 1\n  b 2\n}");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(Kv3ParseError);
    const error = caught as Kv3ParseError;
    expect(error.line).toBe(3);
    expect(error.column).toBe(5);
    expect(error.message).toBe("line 3, column 5: expected '=', found '2'");
  });

  it("rejects unterminated containers", () => {
    expect(() => parseKv3("{ a = [ 1, 2 ")).toThrow("unterminated array");
    expect(() => parseKv3("{ a = 1")).toThrow("unterminated object");
    expect(() => parseKv3("{ a = #[ 00 01 ")).toThrow("unterminated binary blob");
    expect(() => parseKv3('{ a = "open }')).toThrow("unterminated string");
  });

  it("rejects trailing content and empty input", () => {
    expect(() => parseKv3("{ } }")).toThrow("unexpected '}' after root value");
    expect(() => parseKv3("// only a comment\n")).toThrow("document has no root value");
  });
});
