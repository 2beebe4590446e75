import {
	HANDLE_TOKEN,
	MISMATCH_HELPER,
	resolveOptions,
	type GenerateOptions,
	type ResolvedOptions,
} from "./config.ts";
import { GraphValidationError, type Diagnostic } from "./errors.ts";
import type { Edge, Graph } from "./graph.ts";
import { handleClassName, isIdentifier, resolveMethodName } from "./naming.ts";

/** Members every handle class has, which transition methods must not shadow. */
export const RESERVED_MEMBERS: readonly string[] = ["constructor", "get", "set"];

/** Globals the generated module refers to, which its declarations must not shadow. */
export const GLOBAL_NAMES: readonly string[] = ["Error", "Symbol"];

/**
 * Names the generated module declares at the top level, besides the handle
 * classes.
 */
export function moduleNames(resolved: ResolvedOptions): string[] {
	return [
		resolved.machineName,
		resolved.stateTypeName,
		resolved.slotTypeName,
		resolved.entryTypeName,
		resolved.safety === "checked" ? MISMATCH_HELPER : HANDLE_TOKEN,
	];
}

/**
 * Checks a graph against the options it is about to be generated with.
 *
 * Returns every violation found (empty when the graph is valid). The order is
 * stable: unknown endpoints, invalid identifiers, method name collisions,
 * reserved names, then unsupported configuration, each in declaration order.
 * Type parameters of a generic graph are checked along with the vertices.
 */
export function validateGraph(
	graph: Graph,
	options: GenerateOptions = {},
): Diagnostic[] {
	const resolved = resolveOptions(graph.name, options);
	const known = new Set(graph.vertices.map((v) => v.name));
	const diagnostics: Diagnostic[] = [];

	// 1. endpoints
	const edges: Edge[] = [];
	for (const edge of graph.edges) {
		let ok = true;
		for (const name of [edge.source, edge.target]) {
			if (!known.has(name)) {
				ok = false;
				diagnostics.push({
					kind: "UnknownVertex",
					message: `edge ${edge.source} -> ${edge.target} references undeclared vertex "${name}"`,
					name,
					edge: edge.index,
					position: edge.index,
					span: edge.span,
				});
			}
		}
		if (ok) edges.push(edge);
	}

	// 2. identifiers
	for (const { name } of graph.typeParameters) {
		if (!isIdentifier(name)) {
			diagnostics.push({
				kind: "InvalidIdentifier",
				message: `type parameter "${name}" is not a valid identifier`,
				name,
			});
		}
	}
	for (const vertex of graph.vertices) {
		if (!isIdentifier(vertex.name)) {
			diagnostics.push({
				kind: "InvalidIdentifier",
				message: `vertex name "${vertex.name}" is not a valid identifier`,
				vertex: vertex.name,
				name: vertex.name,
				position: vertex.index,
				span: vertex.span,
			});
		}
	}
	for (const edge of edges) {
		const method = resolveMethodName(edge, resolved);
		if (!isIdentifier(method)) {
			diagnostics.push({
				kind: "InvalidIdentifier",
				message: `method name "${method}" of edge ${edge.source} -> ${edge.target} is not a valid identifier`,
				vertex: edge.source,
				name: method,
				edge: edge.index,
				position: edge.index,
				span: edge.span,
			});
		}
	}

	// 3. method names, per source vertex over its whole outgoing list
	for (const vertex of graph.vertices) {
		const seen = new Map<string, Edge>();
		for (const edge of edges) {
			if (edge.source !== vertex.name) continue;
			const method = resolveMethodName(edge, resolved);
			const first = seen.get(method);
			if (!first) {
				seen.set(method, edge);
				continue;
			}
			const parallelDefaults =
				!resolved.renameMethods &&
				first.methodName === null &&
				edge.methodName === null;
			diagnostics.push({
				kind: parallelDefaults
					? "UnsupportedConfiguration"
					: "MethodNameCollision",
				message: parallelDefaults
					? `"${vertex.name}" has parallel edges to "${edge.target}"; with method renaming disabled they need explicit method names`
					: `"${vertex.name}" has two transitions named "${method}" (to "${first.target}" and "${edge.target}")`,
				vertex: vertex.name,
				name: method,
				edge: edge.index,
				position: edge.index,
				span: edge.span,
			});
		}
	}

	// 4. reserved names
	const reserved = new Set(moduleNames(resolved));
	const active = new Set(edges.map((e) => e.source));
	for (const name of moduleNames(resolved)) {
		if (GLOBAL_NAMES.includes(name)) {
			diagnostics.push({
				kind: "ReservedNameCollision",
				message: `"${name}" shadows a global the generated module uses`,
				name,
			});
		}
	}
	const handles = graph.vertices
		.filter((v) => active.has(v.name))
		.map((v) => handleClassName(v.name));
	for (const { name } of graph.typeParameters) {
		if (GLOBAL_NAMES.includes(name) || reserved.has(name) || handles.includes(name)) {
			diagnostics.push({
				kind: "ReservedNameCollision",
				message: `type parameter "${name}" clashes with a name of the generated module`,
				name,
			});
		}
	}
	for (const vertex of graph.vertices) {
		const clashes = [vertex.name];
		if (active.has(vertex.name)) clashes.push(handleClassName(vertex.name));
		for (const name of clashes) {
			if (reserved.has(name)) {
				diagnostics.push({
					kind: "ReservedNameCollision",
					message: `"${name}" clashes with a name of the generated module`,
					vertex: vertex.name,
					name,
					position: vertex.index,
					span: vertex.span,
				});
			}
		}
	}
	for (const edge of edges) {
		const method = resolveMethodName(edge, resolved);
		if (RESERVED_MEMBERS.includes(method)) {
			diagnostics.push({
				kind: "ReservedNameCollision",
				message: `transition method "${method}" of edge ${edge.source} -> ${edge.target} clashes with a handle member`,
				vertex: edge.source,
				name: method,
				edge: edge.index,
				position: edge.index,
				span: edge.span,
			});
		}
	}

	// 5. configuration
	const names = moduleNames(resolved);
	for (const name of names) {
		if (!isIdentifier(name)) {
			diagnostics.push({
				kind: "UnsupportedConfiguration",
				message: `"${name}" is not a valid type name`,
				name,
			});
		}
	}
	const duplicate = names.find((name, i) => names.indexOf(name) !== i);
	if (duplicate !== undefined) {
		diagnostics.push({
			kind: "UnsupportedConfiguration",
			message: `generated type names must be distinct, "${duplicate}" is used twice`,
			name: duplicate,
		});
	}
	const parameters = graph.typeParameters.map((t) => t.name);
	const repeated = parameters.find((name, i) => parameters.indexOf(name) !== i);
	if (repeated !== undefined) {
		diagnostics.push({
			kind: "UnsupportedConfiguration",
			message: `type parameter "${repeated}" is declared twice`,
			name: repeated,
		});
	}
	if (!graph.vertices.length) {
		diagnostics.push({
			kind: "UnsupportedConfiguration",
			message: `"${graph.name}" declares no vertices`,
		});
	}

	return diagnostics;
}

/**
 * Like `validateGraph`, but throws on the first sign of trouble.
 * @throws GraphValidationError carrying all diagnostics
 */
export function assertValidGraph(graph: Graph, options: GenerateOptions = {}): void {
	const diagnostics = validateGraph(graph, options);
	if (diagnostics.length) {
		throw new GraphValidationError(diagnostics);
	}
}
