import assert from "node:assert/strict";
import { test } from "node:test";
import { GraphBuilder } from "../src/graph.ts";
import {
	camelCase,
	defaultMethodName,
	handleClassName,
	isIdentifier,
	resolveMethodName,
	snakeCase,
	splitWords,
} from "../src/naming.ts";

test("identifiers", () => {
	assert.equal(isIdentifier("Red"), true);
	assert.equal(isIdentifier("_private$1"), true);
	assert.equal(isIdentifier("1st"), false);
	assert.equal(isIdentifier("red amber"), false);
	assert.equal(isIdentifier(""), false);
});

test("word splitting", () => {
	assert.deepEqual(splitWords("RedAmber"), ["Red", "Amber"]);
	assert.deepEqual(splitWords("HTTPServer_Ready"), ["HTTP", "Server", "Ready"]);
	assert.deepEqual(splitWords("red_amber"), ["red", "amber"]);
	assert.deepEqual(splitWords("Step2Done"), ["Step2", "Done"]);
});

test("camel and snake case", () => {
	assert.equal(camelCase("RedAmber"), "redAmber");
	assert.equal(camelCase("Red"), "red");
	assert.equal(camelCase("HTTPServer"), "httpServer");
	assert.equal(snakeCase("RedAmber"), "red_amber");
	assert.equal(snakeCase("HTTPServer"), "http_server");
});

test("default method names follow the naming options", () => {
	assert.equal(
		defaultMethodName("RedAmber", { renameMethods: true, methodCase: "camel" }),
		"redAmber"
	);
	assert.equal(
		defaultMethodName("RedAmber", { renameMethods: true, methodCase: "snake" }),
		"red_amber"
	);
	assert.equal(
		defaultMethodName("RedAmber", { renameMethods: false, methodCase: "snake" }),
		"RedAmber"
	);
});

test("explicit method names win", () => {
	const graph = new GraphBuilder("Door")
		.edge({ source: "Closed", target: "Open", methodName: "push" })
		.edge({ source: "Open", target: "Closed" })
		.build();
	const naming = { renameMethods: true, methodCase: "camel" } as const;

	assert.equal(resolveMethodName(graph.edges[0], naming), "push");
	assert.equal(resolveMethodName(graph.edges[1], naming), "closed");
});

test("handle class names", () => {
	assert.equal(handleClassName("Green"), "GreenHandle");
});
