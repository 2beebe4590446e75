import { ParseError, type SourceSpan } from "./errors.ts";
import { GraphBuilder, type Graph } from "./graph.ts";

const ID = String.raw`(?:[A-Za-z_$][\w$]*|"(?:[^"\\]|\\.)*")`;
const HEADER = new RegExp(String.raw`^\s*(?:strict\s+)?digraph\s*(${ID})?\s*\{`);
const ATTRIBUTE = /([A-Za-z_][\w]*)\s*=\s*("(?:[^"\\]|\\.)*"|[^\s,;\]]+)/g;

/**
 * Parses a subset of Graphviz DOT into a graph.
 *
 * **Supported statements:**
 * - `digraph Name { ... }` - the machine (the name may be omitted, see `fallbackName`)
 * - `A;` or `A [type="string", comment="doc"];` - a vertex, `type` declaring its payload
 * - `A -> B -> C [method="go", comment="doc"];` - transitions
 * - `graph [comment="doc"];` - documentation of the machine
 * - `node [...]`, `edge [...]`, `key = value` - accepted and ignored
 * - `//`, `#` and `/* *\/` comments
 *
 * Statements end with `;` or a line break. Undirected graphs and subgraphs are
 * rejected.
 *
 * @throws ParseError on malformed or unsupported input
 *
 * @example
 * ```typescript
 * const graph = fromDot(`
 *   digraph Door {
 *     Open [type="number", comment="Seconds since opening"];
 *     Closed -> Open -> Closed;
 *   }
 * `);
 * ```
 */
export function fromDot(text: string, fallbackName = "StateMachine"): Graph {
	const source = stripComments(text);

	const header = source.match(HEADER);
	if (!header) {
		const at = spanAt(source, Math.max(0, source.search(/\S/)));
		if (/^\s*(?:strict\s+)?graph\b/.test(source)) {
			throw new ParseError("Undirected graphs are not supported, use digraph", at);
		}
		throw new ParseError('Expected "digraph Name {"', at);
	}

	const name = header[1] === undefined ? fallbackName : unquote(header[1]);
	const builder = new GraphBuilder(name);

	const bodyStart = header[0].length;
	const bodyEnd = findClosingBrace(source, bodyStart);
	if (source.slice(bodyEnd + 1).trim()) {
		throw new ParseError(
			"Unexpected content after the graph body",
			spanAt(source, bodyEnd + 1)
		);
	}

	for (const [statement, offset] of splitStatements(source, bodyStart, bodyEnd)) {
		parseStatement(statement, spanAt(source, offset), builder);
	}

	return builder.build();
}

/** Blanks out comments, keeping every offset (and so every line and column) intact. */
function stripComments(text: string): string {
	return text.replace(
		/"(?:[^"\\]|\\.)*"|\/\*[\s\S]*?\*\/|\/\/[^\n]*|^[ \t]*#[^\n]*/gm,
		(match) => (match.startsWith('"') ? match : match.replace(/[^\n]/g, " "))
	);
}

function spanAt(text: string, offset: number): SourceSpan {
	const before = text.slice(0, offset).split("\n");
	return { line: before.length, column: before[before.length - 1].length + 1 };
}

function unquote(id: string): string {
	return id.startsWith('"') ? id.slice(1, -1).replace(/\\(.)/g, "$1") : id;
}

function findClosingBrace(source: string, start: number): number {
	let depth = 0;
	for (let i = start; i < source.length; i++) {
		const ch = source[i];
		if (ch === '"') {
			i = skipString(source, i);
		} else if (ch === "{") {
			depth++;
		} else if (ch === "}") {
			if (!depth) return i;
			depth--;
		}
	}
	throw new ParseError('Missing closing "}"', spanAt(source, source.length));
}

function skipString(source: string, start: number): number {
	for (let i = start + 1; i < source.length; i++) {
		if (source[i] === "\\") i++;
		else if (source[i] === '"') return i;
	}
	throw new ParseError("Unterminated string", spanAt(source, start));
}

/**
 * Yields `[statement, offset]` pairs. Separators inside `[...]` or strings do
 * not split.
 */
function* splitStatements(
	source: string,
	start: number,
	end: number
): Generator<[string, number]> {
	let from = start;
	let depth = 0;
	for (let i = start; i <= end; i++) {
		const ch = source[i];
		if (ch === '"') {
			i = skipString(source, i);
			continue;
		}
		if (ch === "[") depth++;
		if (ch === "]") depth--;
		if (i === end || (!depth && (ch === ";" || ch === "\n"))) {
			const raw = source.slice(from, i);
			const statement = raw.trim();
			if (statement) yield [statement, from + raw.search(/\S/)];
			from = i + 1;
		}
	}
}

function parseAttributes(list: string | undefined): Map<string, string> {
	const attributes = new Map<string, string>();
	if (list === undefined) return attributes;
	for (const [, key, value] of list.matchAll(ATTRIBUTE)) {
		attributes.set(key, unquote(value));
	}
	return attributes;
}

function parseStatement(statement: string, span: SourceSpan, builder: GraphBuilder) {
	if (/^subgraph\b|^\{/.test(statement)) {
		throw new ParseError("Subgraphs are not supported", span);
	}
	if (/^(?:node|edge)\s*\[/.test(statement)) return;
	if (new RegExp(`^${ID}\\s*=`).test(statement)) return;

	const graphAttrs = statement.match(/^graph\s*\[([\s\S]*)\]$/);
	if (graphAttrs) {
		const comment = parseAttributes(graphAttrs[1]).get("comment");
		if (comment !== undefined) builder.doc(comment);
		return;
	}

	const match = statement.match(/^([\s\S]*?)\s*(?:\[([\s\S]*)\])?$/);
	const chain = match?.[1] ?? statement;
	const attributes = parseAttributes(match?.[2]);

	if (chain.includes("--") && !chain.includes("->")) {
		throw new ParseError("Undirected edges are not supported, use ->", span);
	}

	const ids = chain.split("->").map((id) => id.trim());
	for (const id of ids) {
		if (!new RegExp(`^${ID}$`).test(id)) {
			throw new ParseError(`Expected a node id, found "${id}"`, span);
		}
	}
	const names = ids.map(unquote);

	if (names.length === 1) {
		builder.vertex({
			name: names[0],
			payloadType: attributes.get("type") ?? null,
			doc: attributes.get("comment"),
			span,
		});
		return;
	}

	for (let i = 1; i < names.length; i++) {
		builder.edge({
			source: names[i - 1],
			target: names[i],
			methodName: attributes.get("method") ?? null,
			doc: attributes.get("comment"),
			span,
		});
	}
}
