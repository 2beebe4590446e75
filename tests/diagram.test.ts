import assert from "node:assert/strict";
import { test } from "node:test";
import { mermaidBlock, toDot, toMermaid } from "../src/diagram.ts";
import { GraphBuilder } from "../src/graph.ts";

const graph = new GraphBuilder("Switch")
	.vertex({ name: "Broken" })
	.edge({ source: "Off", target: "On" })
	.edge({ source: "On", target: "Off" })
	.build();

test("mermaid flowchart", () => {
	assert.equal(
		toMermaid(graph),
		"graph LR\n  Off --> On;\n  On --> Off;\n  Broken;\n"
	);
});

test("graphviz dot", () => {
	assert.equal(
		toDot(graph),
		"digraph Switch {\n  Off -> On;\n  On -> Off;\n  Broken;\n}\n"
	);
});

test("fenced mermaid block", () => {
	assert.equal(
		mermaidBlock(graph),
		"```mermaid\ngraph LR\n  Off --> On;\n  On --> Off;\n  Broken;\n```"
	);
});

test("graph without edges", () => {
	const lonely = new GraphBuilder("Lonely").vertex({ name: "Only" }).build();
	assert.equal(toMermaid(lonely), "graph LR\n  Only;\n");
});
