import type { GenerateOptions } from "./config.ts";
import { ParseError, type SourceSpan } from "./errors.ts";
import { GraphBuilder, type Graph } from "./graph.ts";

/**
 * Result of parsing a DSL document: the graph plus the options its header selects.
 */
export type DslDocument = {
	graph: Graph;
	options: Pick<GenerateOptions, "visibility">;
};

type Statement = {
	text: string;
	doc: string[];
	span: SourceSpan;
};

const IDENT = /^[A-Za-z_$][\w$]*/;
const HEADER = /^(export\s+)?([A-Za-z_$][\w$]*)\s*/;
const VERTEX = /^([A-Za-z_$][\w$]*)\s*(?::([\s\S]*))?$/;

// ->  -->  -"doc"->  --"doc"-->  -method->  --method-->
const ARROW =
	/^(?:-->|->|--?"((?:[^"\\]|\\.)*)"--?>|--?([A-Za-z_$][\w$]*)--?>)/;

/**
 * Parses the compact DSL into a graph.
 *
 * **Syntax:**
 * - `export Name { ... }` - the machine; `export` makes the generated declarations exported
 * - `export Name<T, U extends object> { ... }` - a machine generic over `T` and `U`
 * - `/// text` - documentation for the machine (before the header) or the next statement
 * - `// text` - comment
 * - `Vertex;` - a vertex without data
 * - `Vertex: Type;` - a vertex carrying a value of the TypeScript type `Type`
 * - `A -> B -> C;` - transitions (`-->` is the same arrow)
 * - `A -"text"-> B;` - a transition with its own documentation
 * - `A -method-> B;` - a transition whose method is called `method`
 *
 * Documentation before a chain is shared by all of its transitions. Vertices
 * first mentioned in a transition are created without data.
 *
 * @throws ParseError on malformed input
 *
 * @example
 * ```typescript
 * const { graph } = parseDsl(`
 *   /// A traffic light.
 *   export TrafficLight {
 *     /// Carries the reason for going green.
 *     Green: string;
 *     Red -> RedAmber -> Green -> Amber -> Red;
 *   }
 * `);
 * ```
 */
export function parseDsl(text: string): DslDocument {
	const lines = text.split("\n");
	const graphDoc: string[] = [];

	let offset = 0;
	for (let i = 0; i < lines.length; i++) {
		const raw = lines[i];
		const line = raw.trim();
		const column = raw.search(/\S/) + 1;

		if (!line || (line.startsWith("//") && !line.startsWith("///"))) {
			offset += raw.length + 1;
			continue;
		}
		if (line.startsWith("///")) {
			graphDoc.push(stripDoc(line));
			offset += raw.length + 1;
			continue;
		}

		const header = line.match(HEADER);
		let pos = header ? header[0].length : 0;
		let typeParameters: string[] = [];
		if (header && line[pos] === "<") {
			const close = closingAngle(line, pos);
			if (close === -1) {
				throw new ParseError("Unclosed type parameter list", {
					line: i + 1,
					column: column + pos,
				});
			}
			typeParameters = splitTypeParameters(line.slice(pos + 1, close), {
				line: i + 1,
				column: column + pos,
			});
			pos = close + 1;
			while (pos < line.length && /\s/.test(line[pos])) pos++;
		}
		if (!header || line[pos] !== "{") {
			throw new ParseError(`Expected a machine header "Name {", found "${line}"`, {
				line: i + 1,
				column,
			});
		}

		const [, exportKw, name] = header;
		const brace = column - 1 + pos;
		const builder = new GraphBuilder(name, graphDoc);
		for (const declaration of typeParameters) {
			builder.typeParameter(declaration);
		}
		const statements = scanStatements(text, offset + brace + 1, {
			line: i + 1,
			column: brace + 2,
		});
		for (const statement of statements) {
			parseStatement(statement, builder);
		}

		return {
			graph: builder.build(),
			options: { visibility: exportKw ? "export" : "local" },
		};
	}

	throw new ParseError('Missing machine header "Name {"', {
		line: lines.length,
		column: 1,
	});
}

/**
 * Parses the compact DSL, returning the graph only.
 * @see parseDsl
 */
export function fromDsl(text: string): Graph {
	return parseDsl(text).graph;
}

/** Index of the `>` closing the `<` at `open`, or -1. */
function closingAngle(text: string, open: number): number {
	let depth = 0;
	for (let i = open; i < text.length; i++) {
		if (text[i] === "<") depth++;
		// `=>` of a function type
		if (text[i] === ">" && text[i - 1] !== "=") depth--;
		if (depth === 0) return i;
	}
	return -1;
}

/** Splits `T, U extends Map<K, V>` at the commas outside of brackets. */
function splitTypeParameters(list: string, span: SourceSpan): string[] {
	const parts: string[] = [];
	let depth = 0;
	let current = "";
	for (let i = 0; i < list.length; i++) {
		const ch = list[i];
		if ("<{([".includes(ch)) depth++;
		if ("})]".includes(ch) || (ch === ">" && list[i - 1] !== "=")) depth--;
		if (ch === "," && depth === 0) {
			parts.push(current.trim());
			current = "";
			continue;
		}
		current += ch;
	}
	parts.push(current.trim());
	if (parts.some((part) => !part)) {
		throw new ParseError("Empty type parameter", span);
	}
	return parts;
}

function stripDoc(comment: string): string {
	return comment.replace(/^\/\/\/ ?/, "").trimEnd();
}

function unescape(raw: string): string {
	return raw.replace(/\\(.)/g, "$1");
}

/**
 * Splits the machine body (starting right after its `{`) into `;` terminated
 * statements, collecting the `///` docs in front of each. Semicolons nested in
 * brackets or strings (e.g. inside an object type) do not end a statement.
 */
function scanStatements(
	text: string,
	start: number,
	startSpan: SourceSpan
): Statement[] {
	const statements: Statement[] = [];
	let { line, column } = startSpan;
	let i = start;
	let depth = 0;
	let buf = "";
	let bufSpan: SourceSpan | null = null;
	let docs: string[] = [];

	const advance = (n: number) => {
		for (let k = 0; k < n; k++, i++) {
			if (text[i] === "\n") {
				line++;
				column = 1;
			} else {
				column++;
			}
		}
	};

	while (i < text.length) {
		const ch = text[i];

		if (text.startsWith("//", i)) {
			const eol = text.indexOf("\n", i);
			const end = eol === -1 ? text.length : eol;
			const comment = text.slice(i, end);
			if (comment.startsWith("///") && !buf.trim()) {
				docs.push(stripDoc(comment));
			}
			advance(end - i);
			continue;
		}

		if (ch === '"') {
			let j = i + 1;
			while (j < text.length && text[j] !== '"' && text[j] !== "\n") {
				j += text[j] === "\\" ? 2 : 1;
			}
			if (text[j] !== '"') {
				throw new ParseError("Unterminated string", { line, column });
			}
			bufSpan ??= { line, column };
			buf += text.slice(i, j + 1);
			advance(j + 1 - i);
			continue;
		}

		if (ch === "}" && depth === 0) {
			if (buf.trim()) {
				throw new ParseError(
					`Expected ";" after "${buf.trim()}"`,
					bufSpan ?? { line, column }
				);
			}
			advance(1);
			const rest = text.slice(i).replace(/\/\/.*$/gm, "").trim();
			if (rest) {
				throw new ParseError(`Unexpected content after the machine body`, {
					line,
					column,
				});
			}
			return statements;
		}

		if (ch === ";" && depth === 0) {
			if (!buf.trim()) {
				throw new ParseError("Empty statement", { line, column });
			}
			statements.push({
				text: buf.trim(),
				doc: docs,
				span: bufSpan ?? { line, column },
			});
			buf = "";
			bufSpan = null;
			docs = [];
			advance(1);
			continue;
		}

		if ("{([".includes(ch)) depth++;
		if ("})]".includes(ch)) depth--;
		if (depth < 0) {
			throw new ParseError(`Unbalanced "${ch}"`, { line, column });
		}

		if (!bufSpan && !/\s/.test(ch)) bufSpan = { line, column };
		buf += ch;
		advance(1);
	}

	throw new ParseError('Missing closing "}"', { line, column });
}

function parseStatement(statement: Statement, builder: GraphBuilder) {
	const { text, doc, span } = statement;

	const vertex = text.match(VERTEX);
	if (vertex) {
		const [, name, payload] = vertex;
		if (payload !== undefined && !payload.trim()) {
			throw new ParseError(`Missing payload type for "${name}"`, span);
		}
		if (payload !== undefined && /->|-"/.test(payload)) {
			throw new ParseError(
				`Payload types can only be declared in vertex statements ("${name}")`,
				span
			);
		}
		builder.vertex({ name, payloadType: payload ?? null, doc, span });
		return;
	}

	const first = text.match(IDENT);
	if (!first) {
		throw new ParseError(`Expected a vertex name, found "${text}"`, span);
	}
	let from = first[0];
	let rest = text.slice(from.length).trimStart();

	while (rest) {
		const arrow = rest.match(ARROW);
		if (!arrow) {
			throw new ParseError(`Expected an arrow after "${from}", found "${rest}"`, span);
		}
		rest = rest.slice(arrow[0].length).trimStart();

		const to = rest.match(IDENT);
		if (!to) {
			throw new ParseError(`Expected a vertex name after "${arrow[0]}"`, span);
		}
		rest = rest.slice(to[0].length).trimStart();

		const [, inline, method] = arrow;
		const edgeDoc = [...doc];
		if (inline !== undefined) {
			if (edgeDoc.length) edgeDoc.push("");
			edgeDoc.push(unescape(inline));
		}
		builder.edge({
			source: from,
			target: to[0],
			methodName: method ?? null,
			doc: edgeDoc,
			span,
		});
		from = to[0];
	}
}
