import { GraphError, type SourceSpan } from "./errors.ts";

/**
 * Vertex declaration as produced by a front end.
 */
export type VertexDecl = {
	name: string;
	/** Opaque TypeScript type expression; absent means the state carries no data */
	payloadType?: string | null;
	doc?: string | string[];
	span?: SourceSpan;
};

/**
 * Edge declaration as produced by a front end.
 */
export type EdgeDecl = {
	source: string;
	target: string;
	/** Overrides the method name derived from `target` */
	methodName?: string | null;
	doc?: string | string[];
	span?: SourceSpan;
};

/**
 * A state of the machine.
 */
export type Vertex = {
	readonly name: string;
	readonly payloadType: string | null;
	readonly doc: readonly string[];
	/** Declaration order */
	readonly index: number;
	/** `false` when the vertex was only ever mentioned as an edge endpoint */
	readonly explicit: boolean;
	readonly span?: SourceSpan;
};

/**
 * A transition of the machine. References its endpoints by name.
 */
export type Edge = {
	readonly source: string;
	readonly target: string;
	readonly methodName: string | null;
	readonly doc: readonly string[];
	/** Declaration order */
	readonly index: number;
	readonly span?: SourceSpan;
};

/**
 * A type parameter of a generic machine, carried onto every generated
 * declaration.
 */
export type TypeParameter = {
	/** The name used in type arguments, e.g. `T` */
	readonly name: string;
	/** The declaration as written, e.g. `T extends object = {}` */
	readonly declaration: string;
};

/**
 * The whole machine description. Vertex and edge order is declaration order,
 * and determines the order of the generated code.
 */
export type Graph = {
	/** Machine name, used to derive the generated type names */
	readonly name: string;
	/** Module level documentation */
	readonly doc: readonly string[];
	/** Empty unless the machine is generic */
	readonly typeParameters: readonly TypeParameter[];
	readonly vertices: readonly Vertex[];
	readonly edges: readonly Edge[];
};

type MutableVertex = {
	-readonly [K in keyof Vertex]: K extends "doc" ? string[] : Vertex[K];
};

/** Normalizes a doc value into a list of lines. */
export function docLines(doc?: string | string[]): string[] {
	if (doc === undefined) return [];
	const lines = Array.isArray(doc) ? doc : doc.split("\n");
	return lines.map((line) => line.replace(/\s+$/, ""));
}

/**
 * Append-only builder for a `Graph`.
 *
 * Declarations may arrive in any order: an edge naming a vertex that was not
 * declared yet creates a bare vertex (no payload, no docs), which a later
 * explicit declaration may complete.
 *
 * @example
 * ```typescript
 * const graph = new GraphBuilder("TrafficLight")
 *   .vertex({ name: "Green", payloadType: "string" })
 *   .edge({ source: "Red", target: "Green" })
 *   .edge({ source: "Green", target: "Red" })
 *   .build();
 * ```
 */
export class GraphBuilder {
	#vertices = new Map<string, MutableVertex>();
	#edges: Edge[] = [];
	#doc: string[] = [];
	#typeParameters: TypeParameter[] = [];

	constructor(public readonly name: string, doc?: string | string[]) {
		this.#doc = docLines(doc);
	}

	/** Appends module level documentation. */
	doc(doc: string | string[]): this {
		appendDocs(this.#doc, docLines(doc));
		return this;
	}

	/**
	 * Makes the machine generic over one more type parameter. Payload types
	 * may then refer to it.
	 *
	 * @example
	 * ```typescript
	 * new GraphBuilder("Box").typeParameter("T extends object").vertex({ name: "Full", payloadType: "T" });
	 * ```
	 */
	typeParameter(declaration: string): this {
		const trimmed = declaration.trim();
		const [name] = trimmed.split(/\s+extends\s|\s*=/);
		this.#typeParameters.push({ name, declaration: trimmed });
		return this;
	}

	/**
	 * Declares a vertex explicitly.
	 * @throws GraphError (`DuplicateVertex`) if an explicit declaration with a different payload exists
	 */
	vertex(decl: VertexDecl): this {
		const payloadType = normalizePayload(decl.payloadType);
		const existing = this.#vertices.get(decl.name);

		if (!existing) {
			this.#vertices.set(decl.name, {
				name: decl.name,
				payloadType,
				doc: docLines(decl.doc),
				index: this.#vertices.size,
				explicit: true,
				span: decl.span,
			});
			return this;
		}

		if (!existing.explicit) {
			// first explicit declaration of an implicitly created vertex
			existing.explicit = true;
			existing.payloadType = payloadType;
			existing.span = decl.span ?? existing.span;
			appendDocs(existing.doc, docLines(decl.doc));
			return this;
		}

		if (existing.payloadType !== payloadType) {
			throw new GraphError({
				kind: "DuplicateVertex",
				message: `"${decl.name}" is declared with ${describePayload(
					existing.payloadType,
				)} and with ${describePayload(payloadType)}`,
				vertex: decl.name,
				name: decl.name,
				position: existing.index,
				span: decl.span,
			});
		}

		appendDocs(existing.doc, docLines(decl.doc));
		return this;
	}

	/**
	 * Declares a transition, creating bare vertices for unknown endpoints.
	 */
	edge(decl: EdgeDecl): this {
		this.#implicit(decl.source, decl.span);
		this.#implicit(decl.target, decl.span);
		this.#edges.push({
			source: decl.source,
			target: decl.target,
			methodName: decl.methodName ?? null,
			doc: docLines(decl.doc),
			index: this.#edges.length,
			span: decl.span,
		});
		return this;
	}

	/** Whether a vertex of that name exists (explicitly or implicitly). */
	has(name: string): boolean {
		return this.#vertices.has(name);
	}

	/** Returns the immutable graph. The builder may keep being used afterwards. */
	build(): Graph {
		const vertices = [...this.#vertices.values()]
			.sort((a, b) => a.index - b.index)
			.map((v): Vertex => Object.freeze({ ...v, doc: Object.freeze([...v.doc]) }));
		return Object.freeze({
			name: this.name,
			doc: Object.freeze([...this.#doc]),
			typeParameters: Object.freeze(this.#typeParameters.map((t) => Object.freeze({ ...t }))),
			vertices: Object.freeze(vertices),
			edges: Object.freeze(
				this.#edges.map((e) => Object.freeze({ ...e, doc: Object.freeze([...e.doc]) })),
			),
		});
	}

	#implicit(name: string, span?: SourceSpan) {
		if (this.#vertices.has(name)) return;
		this.#vertices.set(name, {
			name,
			payloadType: null,
			doc: [],
			index: this.#vertices.size,
			explicit: false,
			span,
		});
	}
}

/**
 * Looks up a vertex by name.
 */
export function findVertex(graph: Graph, name: string): Vertex | undefined {
	return graph.vertices.find((v) => v.name === name);
}

function normalizePayload(payloadType?: string | null): string | null {
	const trimmed = payloadType?.trim();
	return trimmed ? trimmed : null;
}

function describePayload(payloadType: string | null): string {
	return payloadType === null ? "no payload" : `payload \`${payloadType}\``;
}

/** Appends `src` to `dst`, separated by a blank line when both are non-empty. */
function appendDocs(dst: string[], src: string[]) {
	if (!src.length) return;
	if (dst.length) dst.push("");
	dst.push(...src);
}
