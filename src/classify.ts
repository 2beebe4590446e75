import type { Edge, Graph, Vertex } from "./graph.ts";
import { resolveMethodName, type MethodNaming } from "./naming.ts";

/**
 * Structural role of a vertex:
 * - `isolated`: no incoming and no outgoing edges
 * - `source`: outgoing edges only
 * - `sink`: incoming edges only
 * - `through`: both
 */
export type Role = "isolated" | "source" | "sink" | "through";

/**
 * An edge as seen from one of its endpoints, with its method name resolved.
 */
export type Transition = {
	edge: Edge;
	/** The vertex at the other end */
	other: Vertex;
	/** Method on the source vertex's handle */
	method: string;
};

/**
 * Everything the code generator needs about one vertex.
 */
export type Classified = {
	vertex: Vertex;
	role: Role;
	/** Outgoing transitions in declaration order */
	outgoing: Transition[];
	/** Incoming transitions in declaration order */
	incoming: Transition[];
};

/** Source and through vertices get a handle; the rest are terminal. */
export function isActive(role: Role): boolean {
	return role === "source" || role === "through";
}

export function roleOf(incoming: number, outgoing: number): Role {
	if (!incoming) return outgoing ? "source" : "isolated";
	return outgoing ? "through" : "sink";
}

/**
 * Classifies every vertex of a (validated) graph, in declaration order.
 *
 * Method names are resolved here, once per edge, so every consumer sees the
 * same names.
 */
export function classifyGraph(graph: Graph, naming: MethodNaming): Classified[] {
	const byName = new Map(graph.vertices.map((v) => [v.name, v]));
	const outgoing = new Map<string, Transition[]>();
	const incoming = new Map<string, Transition[]>();

	for (const edge of graph.edges) {
		const source = byName.get(edge.source);
		const target = byName.get(edge.target);
		if (!source || !target) {
			throw new Error(
				`Cannot classify edge ${edge.source} -> ${edge.target}: unknown vertex (validate the graph first)`
			);
		}
		const method = resolveMethodName(edge, naming);
		push(outgoing, source.name, { edge, other: target, method });
		push(incoming, target.name, { edge, other: source, method });
	}

	return graph.vertices.map((vertex) => {
		const out = outgoing.get(vertex.name) ?? [];
		const inc = incoming.get(vertex.name) ?? [];
		return {
			vertex,
			role: roleOf(inc.length, out.length),
			outgoing: out,
			incoming: inc,
		};
	});
}

function push<K, V>(map: Map<K, V[]>, key: K, value: V) {
	const list = map.get(key);
	if (list) list.push(value);
	else map.set(key, [value]);
}
