import assert from "node:assert/strict";
import { test } from "node:test";
import { GraphError } from "../src/errors.ts";
import { docLines, findVertex, GraphBuilder } from "../src/graph.ts";

test("vertices keep declaration order, edge endpoints included", () => {
	const graph = new GraphBuilder("TrafficLight")
		.vertex({ name: "Green", payloadType: "string" })
		.edge({ source: "Red", target: "Green" })
		.edge({ source: "Green", target: "Amber" })
		.build();

	assert.deepEqual(
		graph.vertices.map((v) => [v.name, v.index, v.explicit]),
		[
			["Green", 0, true],
			["Red", 1, false],
			["Amber", 2, false],
		]
	);
	assert.deepEqual(
		graph.edges.map((e) => [e.source, e.target, e.index]),
		[
			["Red", "Green", 0],
			["Green", "Amber", 1],
		]
	);
});

test("implicit vertices are completed by a later declaration", () => {
	const graph = new GraphBuilder("M")
		.edge({ source: "A", target: "B" })
		.vertex({ name: "B", payloadType: "number", doc: "Counts." })
		.build();

	const b = findVertex(graph, "B");
	assert.equal(b?.payloadType, "number");
	assert.deepEqual(b?.doc, ["Counts."]);
	assert.equal(b?.explicit, true);
	assert.equal(b?.index, 1);
});

test("duplicate declarations with different payloads are rejected", () => {
	const builder = new GraphBuilder("M").vertex({ name: "A", payloadType: "string" });

	assert.throws(
		() => builder.vertex({ name: "A", payloadType: "number" }),
		(error: unknown) => {
			assert.ok(error instanceof GraphError);
			assert.equal(error.kind, "DuplicateVertex");
			assert.equal(error.diagnostic.vertex, "A");
			assert.equal(
				error.message,
				'DuplicateVertex: "A" is declared with payload `string` and with payload `number`'
			);
			return true;
		}
	);
	assert.throws(() => builder.vertex({ name: "A" }), GraphError);
});

test("identical declarations merge their docs", () => {
	const graph = new GraphBuilder("M")
		.vertex({ name: "A", payloadType: "string", doc: "First." })
		.vertex({ name: "A", payloadType: " string ", doc: "Second." })
		.build();

	assert.equal(graph.vertices.length, 1);
	assert.deepEqual(graph.vertices[0].doc, ["First.", "", "Second."]);
});

test("blank payload types mean no payload", () => {
	const graph = new GraphBuilder("M").vertex({ name: "A", payloadType: "  " }).build();
	assert.equal(graph.vertices[0].payloadType, null);
});

test("built graphs are frozen and independent of the builder", () => {
	const builder = new GraphBuilder("M", "Machine docs.").vertex({ name: "A" });
	const graph = builder.build();
	builder.vertex({ name: "B" });

	assert.equal(Object.isFrozen(graph), true);
	assert.equal(Object.isFrozen(graph.vertices), true);
	assert.equal(graph.vertices.length, 1);
	assert.deepEqual(graph.doc, ["Machine docs."]);
});

test("doc normalization", () => {
	assert.deepEqual(docLines(), []);
	assert.deepEqual(docLines("one  \ntwo"), ["one", "two"]);
	assert.deepEqual(docLines(["a ", "b"]), ["a", "b"]);
});

test("type parameters", () => {
	const graph = new GraphBuilder("Box")
		.typeParameter(" T extends object ")
		.typeParameter("U=string")
		.build();

	assert.deepEqual(graph.typeParameters, [
		{ name: "T", declaration: "T extends object" },
		{ name: "U", declaration: "U=string" },
	]);
	assert.equal(Object.isFrozen(graph.typeParameters), true);
	assert.deepEqual(new GraphBuilder("M").build().typeParameters, []);
});
