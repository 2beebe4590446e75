import type { Graph } from "./graph.ts";

/**
 * Turns a graph into text embedded in the generated docs.
 * Return `null` to skip embedding.
 */
export type DiagramRenderer = (graph: Graph) => string | null;

/**
 * Lists edges first (declaration order), then the vertices no edge touches.
 */
function draw(graph: Graph): Array<[string, string] | string> {
	const touched = new Set<string>();
	const out: Array<[string, string] | string> = [];
	for (const { source, target } of graph.edges) {
		touched.add(source);
		touched.add(target);
		out.push([source, target]);
	}
	for (const { name } of graph.vertices) {
		if (!touched.has(name)) out.push(name);
	}
	return out;
}

/**
 * Generates a Mermaid flowchart of the graph.
 *
 * @example
 * ```typescript
 * console.log(toMermaid(graph));
 * // graph LR
 * //   Red --> Green;
 * //   Green --> Red;
 * //   Off;
 * ```
 */
export function toMermaid(graph: Graph): string {
	let mermaid = "graph LR\n";
	for (const item of draw(graph)) {
		mermaid +=
			typeof item === "string"
				? `  ${item};\n`
				: `  ${item[0]} --> ${item[1]};\n`;
	}
	return mermaid;
}

/**
 * Generates a Graphviz DOT description of the graph, suitable for `dot -Tsvg`.
 */
export function toDot(graph: Graph): string {
	let dot = `digraph ${graph.name} {\n`;
	for (const item of draw(graph)) {
		dot +=
			typeof item === "string"
				? `  ${item};\n`
				: `  ${item[0]} -> ${item[1]};\n`;
	}
	dot += "}\n";
	return dot;
}

/**
 * Default renderer: the Mermaid diagram in a fenced code block, which
 * documentation tools with Mermaid support display as a chart.
 */
export const mermaidBlock: DiagramRenderer = (graph) =>
	["```mermaid", toMermaid(graph).trimEnd(), "```"].join("\n");
