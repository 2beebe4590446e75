import { classifyGraph, isActive, type Classified, type Transition } from "./classify.ts";
import {
	createDebugLog,
	HANDLE_TOKEN,
	MISMATCH_HELPER,
	resolveOptions,
	type GenerateOptions,
	type ResolvedOptions,
	type Visibility,
} from "./config.ts";
import type { Graph, Vertex } from "./graph.ts";
import { handleClassName } from "./naming.ts";
import { assertValidGraph } from "./validate.ts";

/**
 * Line oriented source builder with indentation.
 */
export class CodeWriter {
	#lines: string[] = [];
	#depth = 0;

	constructor(public readonly indent: string = "\t") {}

	line(text = ""): this {
		this.#lines.push(text ? this.indent.repeat(this.#depth) + text : "");
		return this;
	}

	/** Writes `open`, then `body` one level deeper, then `close`. */
	block(open: string, body: () => void, close = "}"): this {
		this.line(open);
		this.#depth++;
		body();
		this.#depth--;
		return this.line(close);
	}

	/** Runs `body` one level deeper, without delimiters. */
	nested(body: () => void): this {
		this.#depth++;
		body();
		this.#depth--;
		return this;
	}

	/** Writes a doc comment; nothing for an empty list. */
	doc(lines: readonly string[]): this {
		if (!lines.length) return this;
		if (lines.length === 1 && lines[0]) {
			return this.line(`/** ${escapeComment(lines[0])} */`);
		}
		this.line("/**");
		for (const l of lines) {
			this.line(l ? ` * ${escapeComment(l)}` : " *");
		}
		return this.line(" */");
	}

	toString(): string {
		return this.#lines.join("\n") + "\n";
	}
}

function escapeComment(text: string): string {
	return text.replace(/\*\//g, "*\\/");
}

function exported(visibility: Visibility): string {
	return visibility === "export" ? "export " : "";
}

/** Type parameter lists of a generic machine, empty strings otherwise. */
type Generics = {
	/** `<T extends object, U = string>`, for declarations */
	params: string;
	/** `<T, U>`, for references */
	args: string;
};

function generics(graph: Graph): Generics {
	if (!graph.typeParameters.length) return { params: "", args: "" };
	return {
		params: `<${graph.typeParameters.map((t) => t.declaration).join(", ")}>`,
		args: `<${graph.typeParameters.map((t) => t.name).join(", ")}>`,
	};
}

/** Joins doc paragraphs with a blank line, dropping empty ones. */
function paragraphs(...parts: (readonly string[])[]): string[] {
	const out: string[] = [];
	for (const part of parts) {
		if (!part.length) continue;
		if (out.length) out.push("");
		out.push(...part);
	}
	return out;
}

/**
 * Generates a TypeScript module implementing the state machine described by
 * `graph`: a state union, an entry union, a handle class per active vertex and
 * the machine class itself.
 *
 * The graph is validated first; generation is pure and synchronous.
 *
 * @throws GraphValidationError if the graph or the options are invalid
 *
 * @example
 * ```typescript
 * const graph = fromDsl(`
 *   export TrafficLight {
 *     Green: string;
 *     Red -> RedAmber -> Green -> Amber;
 *   }
 * `);
 * const source = generate(graph, { safety: "checked" });
 * ```
 */
export function generate(graph: Graph, options: GenerateOptions = {}): string {
	const resolved = resolveOptions(graph.name, options);
	const debugLog = createDebugLog(resolved);
	debugLog(
		`generate("${graph.name}"): ${graph.vertices.length} vertices, ${graph.edges.length} edges`
	);

	assertValidGraph(graph, options);
	if (resolved.visibility !== resolved.entryVisibility) {
		resolved.logger.warn(
			"[fsm-codegen]",
			`generate("${graph.name}"): visibility "${resolved.visibility}" and entry visibility "${resolved.entryVisibility}" differ, exported declarations refer to local ones`
		);
	}

	const classified = classifyGraph(graph, resolved);
	for (const { vertex, role, outgoing } of classified) {
		debugLog(
			`generate("${graph.name}"): "${vertex.name}" is ${role} with ${outgoing.length} transition(s)`
		);
	}

	const source = emitModule(graph, classified, resolved);
	debugLog(`generate("${graph.name}"): ${source.length} characters emitted`);
	return source;
}

function emitModule(
	graph: Graph,
	classified: Classified[],
	o: ResolvedOptions
): string {
	const w = new CodeWriter(o.indent);
	const active = classified.filter((c) => isActive(c.role));
	const g = generics(graph);

	if (o.header) {
		w.line("// Code generated by fsm-codegen. DO NOT EDIT.");
		w.line();
	}

	emitStateType(w, graph, classified, o, g);
	w.line();
	emitSlot(w, o, g);
	w.line();
	emitEntryType(w, graph, classified, o, g);
	w.line();
	emitMachine(w, graph, classified, o, g);

	if (o.safety === "trusted" && active.length) {
		w.line();
		w.doc(["Handles can only be constructed by this module."]);
		w.line(`const ${HANDLE_TOKEN}: unique symbol = Symbol("${o.machineName} handle");`);
	}

	for (const c of active) {
		w.line();
		emitHandle(w, c, o, g);
	}

	if (o.safety === "checked" && active.length) {
		w.line();
		w.block(`function ${MISMATCH_HELPER}(expected: string, actual: string): never {`, () => {
			w.line(
				"throw new Error(`entry handle was instantiated with a mismatched state: expected ${expected}, found ${actual}`);"
			);
		});
	}

	return w.toString();
}

function stateCase(vertex: Vertex): string {
	return vertex.payloadType === null
		? `{ readonly kind: "${vertex.name}" }`
		: `{ readonly kind: "${vertex.name}"; readonly data: ${vertex.payloadType} }`;
}

function emitUnion(
	w: CodeWriter,
	head: string,
	members: Array<{ doc: string[]; type: string }>
) {
	w.line(head);
	w.nested(() => {
		members.forEach(({ doc, type }, i) => {
			w.doc(doc);
			w.line(`| ${type}${i === members.length - 1 ? ";" : ""}`);
		});
	});
}

function emitStateType(
	w: CodeWriter,
	graph: Graph,
	classified: Classified[],
	o: ResolvedOptions,
	g: Generics
) {
	w.doc(
		paragraphs(graph.doc, [
			`Every state of {@link ${o.machineName}}, with the data each one carries.`,
		])
	);
	for (const annotation of o.annotations) w.line(annotation);
	emitUnion(
		w,
		`${exported(o.visibility)}type ${o.stateTypeName}${g.params} =`,
		classified.map(({ vertex }) => ({
			doc: [...vertex.doc],
			type: stateCase(vertex),
		}))
	);
}

function emitSlot(w: CodeWriter, o: ResolvedOptions, g: Generics) {
	w.doc([
		`Storage for the current state of a {@link ${o.machineName}}.`,
		"Only handle methods write to it.",
	]);
	w.block(`${exported(o.visibility)}interface ${o.slotTypeName}${g.params} {`, () => {
		w.line(`state: ${o.stateTypeName}${g.args};`);
	});
}

function reachability(c: Classified): string[] {
	const from = c.incoming.map(
		({ other, method }) =>
			`- \`${other.name}\` via {@link ${handleClassName(other.name)}.${method}}`
	);
	const to = c.outgoing.map(
		({ other, method }) =>
			`- \`${other.name}\` via {@link ${handleClassName(c.vertex.name)}.${method}}`
	);
	return paragraphs(
		[`Represents \`${c.vertex.name}\`.`],
		from.length ? ["Reachable from:", ...from] : [],
		to.length ? ["Can transition to:", ...to] : []
	);
}

function entryCase(c: Classified, g: Generics): string {
	const { name, payloadType } = c.vertex;
	if (isActive(c.role)) {
		return `{ readonly kind: "${name}"; readonly handle: ${handleClassName(name)}${g.args} }`;
	}
	return payloadType === null
		? `{ readonly kind: "${name}" }`
		: `{ readonly kind: "${name}"; readonly data: ${payloadType} }`;
}

function emitEntryType(
	w: CodeWriter,
	graph: Graph,
	classified: Classified[],
	o: ResolvedOptions,
	g: Generics
) {
	const diagram = o.diagram ? o.renderDiagram(graph) : null;
	w.doc(
		paragraphs(
			[
				`Progress through the states of {@link ${o.machineName}}, created by its \`entry\` method.`,
			],
			diagram === null ? [] : diagram.split("\n")
		)
	);
	for (const annotation of o.annotations) w.line(annotation);
	emitUnion(
		w,
		`${exported(o.entryVisibility)}type ${o.entryTypeName}${g.params} =`,
		classified.map((c) => ({ doc: reachability(c), type: entryCase(c, g) }))
	);
}

function emitMachine(
	w: CodeWriter,
	graph: Graph,
	classified: Classified[],
	o: ResolvedOptions,
	g: Generics
) {
	const state = `${o.stateTypeName}${g.args}`;
	const token = o.safety === "trusted" ? `, ${HANDLE_TOKEN}` : "";
	w.doc(
		paragraphs(graph.doc, [
			`A state machine over {@link ${o.stateTypeName}}.`,
			`Transitions are only possible through the handles returned by {@link ${o.machineName}.entry}.`,
		])
	);
	w.block(`${exported(o.visibility)}class ${o.machineName}${g.params} {`, () => {
		w.line(`readonly #slot: ${o.slotTypeName}${g.args};`);
		w.line();
		w.doc(["Any state may be the initial one."]);
		w.block(`constructor(initial: ${state}) {`, () => {
			w.line("this.#slot = { state: initial };");
		});
		w.line();
		w.doc(["The current state."]);
		w.block(`get state(): ${state} {`, () => {
			w.line("return this.#slot.state;");
		});
		w.line();
		w.doc(["Inspects the current state. Does not change it."]);
		w.block(`entry(): ${o.entryTypeName}${g.args} {`, () => {
			w.line("const state = this.#slot.state;");
			w.block("switch (state.kind) {", () => {
				for (const c of classified) {
					const { name, payloadType } = c.vertex;
					w.line(`case "${name}":`);
					w.nested(() => {
						if (isActive(c.role)) {
							w.line(
								`return { kind: "${name}", handle: new ${handleClassName(name)}${g.args}(this.#slot${token}) };`
							);
						} else if (payloadType === null) {
							w.line(`return { kind: "${name}" };`);
						} else {
							w.line(`return { kind: "${name}", data: state.data };`);
						}
					});
				}
			});
		});
	});
}

function emitHandle(
	w: CodeWriter,
	c: Classified,
	o: ResolvedOptions,
	g: Generics
) {
	const { name, payloadType } = c.vertex;
	const checked = o.safety === "checked";
	// payload-less vertices only need #current() to run the guard
	const hasCurrent = checked || payloadType !== null;
	const slot = `${o.slotTypeName}${g.args}`;
	const narrowed = stateCase(c.vertex);

	w.doc([
		`Handle for \`${name}\`, see {@link ${o.entryTypeName}}.`,
		"",
		`Obtained from {@link ${o.machineName}.entry}. A transition method consumes the handle:`,
		"do not use it afterwards.",
	]);
	w.block(`${exported(o.entryVisibility)}class ${handleClassName(name)}${g.params} {`, () => {
		w.line(`readonly #slot: ${slot};`);
		w.line();
		w.doc([`The slot MUST hold \`${name}\`.`]);
		const params = checked ? `slot: ${slot}` : `slot: ${slot}, _token: typeof ${HANDLE_TOKEN}`;
		w.block(`constructor(${params}) {`, () => {
			w.line("this.#slot = slot;");
		});

		if (payloadType !== null) {
			w.line();
			w.doc([`Returns the data of \`${name}\`.`]);
			w.block(`get(): ${payloadType} {`, () => {
				w.line("return this.#current().data;");
			});
			w.line();
			w.doc([`Replaces the data of \`${name}\`.`]);
			w.block(`set(data: ${payloadType}): void {`, () => {
				if (checked) w.line("this.#current();");
				w.line(`this.#slot.state = { kind: "${name}", data };`);
			});
		}

		for (const t of c.outgoing) {
			w.line();
			emitTransition(w, c.vertex, t, checked);
		}

		if (hasCurrent) {
			w.line();
			w.block(`#current(): ${narrowed} {`, () => {
				if (checked) {
					w.line("const state = this.#slot.state;");
					w.line(`if (state.kind === "${name}") return state;`);
					w.line(`return ${MISMATCH_HELPER}("${name}", this.#slot.state.kind);`);
				} else {
					w.line(`// trusted: the slot holds "${name}" for as long as this handle is used`);
					w.line(`return this.#slot.state as ${narrowed};`);
				}
			});
		}
	});
}

function emitTransition(
	w: CodeWriter,
	source: Vertex,
	t: Transition,
	checked: boolean
) {
	const target = t.other;
	const returns = source.payloadType !== null;
	const param = target.payloadType === null ? "" : `data: ${target.payloadType}`;
	const next =
		target.payloadType === null
			? `{ kind: "${target.name}" }`
			: `{ kind: "${target.name}", data }`;

	w.doc(
		paragraphs(t.edge.doc, [
			returns
				? `Transition to \`${target.name}\`, returning the data of \`${source.name}\`.`
				: `Transition to \`${target.name}\`.`,
		])
	);
	w.block(`${t.method}(${param}): ${returns ? source.payloadType : "void"} {`, () => {
		if (returns) {
			w.line("const previous = this.#current().data;");
		} else if (checked) {
			w.line("this.#current();");
		}
		w.line(`this.#slot.state = ${next};`);
		if (returns) w.line("return previous;");
	});
}
