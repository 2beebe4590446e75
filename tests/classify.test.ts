import assert from "node:assert/strict";
import { test } from "node:test";
import { classifyGraph, isActive, roleOf } from "../src/classify.ts";
import { GraphBuilder } from "../src/graph.ts";

const camel = { renameMethods: true, methodCase: "camel" } as const;

test("roles", () => {
	assert.equal(roleOf(0, 0), "isolated");
	assert.equal(roleOf(0, 2), "source");
	assert.equal(roleOf(1, 0), "sink");
	assert.equal(roleOf(3, 1), "through");

	assert.equal(isActive("source"), true);
	assert.equal(isActive("through"), true);
	assert.equal(isActive("sink"), false);
	assert.equal(isActive("isolated"), false);
});

test("traffic light", () => {
	const graph = new GraphBuilder("TrafficLight")
		.vertex({ name: "Off" })
		.edge({ source: "Red", target: "RedAmber" })
		.edge({ source: "RedAmber", target: "Green" })
		.edge({ source: "Green", target: "Amber" })
		.build();

	const classified = classifyGraph(graph, camel);

	assert.deepEqual(
		classified.map((c) => [c.vertex.name, c.role]),
		[
			["Off", "isolated"],
			["Red", "source"],
			["RedAmber", "through"],
			["Green", "through"],
			["Amber", "sink"],
		]
	);
	const green = classified[3];
	assert.deepEqual(
		green.outgoing.map((t) => [t.other.name, t.method]),
		[["Amber", "amber"]]
	);
	assert.deepEqual(
		green.incoming.map((t) => [t.other.name, t.method]),
		[["RedAmber", "green"]]
	);
});

test("self loops make a vertex through", () => {
	const graph = new GraphBuilder("Counter")
		.edge({ source: "Counting", target: "Counting", methodName: "tick" })
		.build();

	const [counting] = classifyGraph(graph, camel);
	assert.equal(counting.role, "through");
	assert.deepEqual(
		counting.outgoing.map((t) => t.method),
		["tick"]
	);
	assert.deepEqual(
		counting.incoming.map((t) => t.method),
		["tick"]
	);
});

test("transitions keep declaration order and resolve names once", () => {
	const graph = new GraphBuilder("M")
		.edge({ source: "A", target: "ZedState" })
		.edge({ source: "A", target: "B", methodName: "custom" })
		.edge({ source: "A", target: "Ab" })
		.build();

	const [a] = classifyGraph(graph, { renameMethods: true, methodCase: "snake" });
	assert.deepEqual(
		a.outgoing.map((t) => t.method),
		["zed_state", "custom", "ab"]
	);
});
