import assert from "node:assert/strict";
import { test } from "node:test";
import { ParseError } from "../src/errors.ts";
import { fromDot } from "../src/from-dot.ts";

test("door", () => {
	const graph = fromDot(`
		// a door
		digraph Door {
			graph [comment="A door."];
			node [shape=box];
			rankdir = LR;
			Open [type="number", comment="Seconds open."];
			Closed -> Open -> Closed;
			Closed -> Locked [method="lock", comment="Needs a key."]
			# hash comment
			/* block
			   comment */
		}
	`);

	assert.equal(graph.name, "Door");
	assert.deepEqual(graph.doc, ["A door."]);
	assert.deepEqual(
		graph.vertices.map((v) => [v.name, v.payloadType, v.doc]),
		[
			["Open", "number", ["Seconds open."]],
			["Closed", null, []],
			["Locked", null, []],
		]
	);
	assert.deepEqual(
		graph.edges.map((e) => [e.source, e.target, e.methodName, e.doc]),
		[
			["Closed", "Open", null, []],
			["Open", "Closed", null, []],
			["Closed", "Locked", "lock", ["Needs a key."]],
		]
	);
});

test("anonymous digraphs take the fallback name", () => {
	assert.equal(fromDot("digraph { A -> B }").name, "StateMachine");
	assert.equal(fromDot("digraph { A -> B }", "Flow").name, "Flow");
	assert.equal(fromDot('strict digraph "Quoted" { A }').name, "Quoted");
});

test("quoted ids and attribute values", () => {
	const graph = fromDot(`digraph G { "A" -> "B" [comment="say \\"hi\\"; twice"] }`);

	assert.deepEqual(
		graph.edges.map((e) => [e.source, e.target, e.doc]),
		[["A", "B", ['say "hi"; twice']]]
	);
});

test("spans", () => {
	const graph = fromDot("digraph G {\n  A -> B\n}");
	assert.deepEqual(graph.edges[0].span, { line: 2, column: 3 });
});

test("unsupported input", () => {
	assert.throws(() => fromDot("graph G { A -- B }"), {
		message: "Undirected graphs are not supported, use digraph (line 1, column 1)",
	});
	assert.throws(() => fromDot("digraph G { A -- B }"), {
		message: "Undirected edges are not supported, use -> (line 1, column 13)",
	});
	assert.throws(() => fromDot("digraph G { subgraph cluster { A } }"), {
		message: "Subgraphs are not supported (line 1, column 13)",
	});
	assert.throws(() => fromDot("digraph G { A -> B"), ParseError);
	assert.throws(() => fromDot("digraph G { A } extra"), ParseError);
	assert.throws(() => fromDot("digraph G { A -> 1x }"), {
		message: 'Expected a node id, found "1x" (line 1, column 13)',
	});
});
