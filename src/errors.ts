/**
 * Location of a declaration in the text it was parsed from (1-based).
 */
export type SourceSpan = {
	line: number;
	column: number;
};

/**
 * Every kind of problem the generator can report about a graph or its options.
 *
 * - `DuplicateVertex` - a vertex was declared twice with different payloads
 * - `UnknownVertex` - an edge names a vertex the graph does not contain
 * - `MethodNameCollision` - two outgoing edges of a vertex resolve to the same method
 * - `ReservedNameCollision` - a name clashes with one the generated module needs
 * - `InvalidIdentifier` - a vertex or method name is not a valid identifier
 * - `UnsupportedConfiguration` - the options cannot be satisfied for this graph
 */
export type DiagnosticKind =
	| "DuplicateVertex"
	| "UnknownVertex"
	| "MethodNameCollision"
	| "ReservedNameCollision"
	| "InvalidIdentifier"
	| "UnsupportedConfiguration";

/**
 * A single generation-time problem, with enough context to point the author
 * of the graph at the offending declaration.
 */
export type Diagnostic = {
	kind: DiagnosticKind;
	message: string;
	/** Vertex the problem is attached to, if any */
	vertex?: string;
	/** Declaration index of the offending edge, if any */
	edge?: number;
	/** The offending name (method, vertex or type name) */
	name?: string;
	/** Declaration index of the offending vertex or edge */
	position?: number;
	span?: SourceSpan;
};

function formatSpan(span?: SourceSpan): string {
	return span ? ` (line ${span.line}, column ${span.column})` : "";
}

/**
 * Formats a diagnostic as a single line, e.g.
 * `MethodNameCollision: "A" has two transitions named "fooBar" (line 3, column 2)`.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
	return `${diagnostic.kind}: ${diagnostic.message}${formatSpan(diagnostic.span)}`;
}

/**
 * Thrown by the graph builder as soon as a declaration is rejected.
 */
export class GraphError extends Error {
	readonly diagnostic: Diagnostic;

	constructor(diagnostic: Diagnostic, options?: ErrorOptions) {
		super(formatDiagnostic(diagnostic), options);
		this.name = "GraphError";
		this.diagnostic = diagnostic;
	}

	get kind(): DiagnosticKind {
		return this.diagnostic.kind;
	}
}

/**
 * Thrown by `generate()` when validation fails. Carries every diagnostic found,
 * in declaration order.
 */
export class GraphValidationError extends Error {
	readonly diagnostics: readonly Diagnostic[];

	constructor(diagnostics: readonly Diagnostic[]) {
		const [first] = diagnostics;
		const more = diagnostics.length > 1 ? ` (+${diagnostics.length - 1} more)` : "";
		super(
			first ? `${formatDiagnostic(first)}${more}` : "Invalid graph",
		);
		this.name = "GraphValidationError";
		this.diagnostics = diagnostics;
	}
}

/**
 * Thrown by the text front ends on malformed input.
 */
export class ParseError extends Error {
	readonly span: SourceSpan;

	constructor(message: string, span: SourceSpan) {
		super(`${message}${formatSpan(span)}`);
		this.name = "ParseError";
		this.span = span;
	}
}
