import { spawnSync } from "node:child_process";
import { readFile } from "node:fs/promises";
import { createClog } from "@marianmeres/clog";
import { Command, Option } from "commander";
import {
	createDebugLog,
	defaultLogger,
	type GenerateOptions,
	type Logger,
	type SafetyMode,
} from "./config.ts";
import { toDot, toMermaid } from "./diagram.ts";
import { formatDiagnostic, GraphValidationError } from "./errors.ts";
import { parseDsl } from "./from-dsl.ts";
import { fromDot } from "./from-dot.ts";
import { fromMermaid } from "./from-mermaid.ts";
import { generate } from "./generate.ts";
import type { Graph } from "./graph.ts";
import type { MethodCase } from "./naming.ts";

export type InputLanguage = "dsl" | "dot" | "mermaid";

/**
 * - `auto`: embed an SVG rendering when graphviz is available, otherwise fall back to `--diagram`
 * - `force`: embed an SVG rendering, fail without graphviz
 * - `omit`: never render SVG
 */
export type SvgMode = "auto" | "force" | "omit";

export type EmitKind = "code" | "mermaid" | "dot";

/** Parsed command line options. */
export interface CliOptions {
	language: InputLanguage;
	name?: string;
	entry?: string;
	state?: string;
	safety: SafetyMode;
	renameMethods: boolean;
	methodCase: MethodCase;
	local?: boolean;
	diagram?: boolean;
	svg: SvgMode;
	annotate: string[];
	indent: string;
	emit: EmitKind;
	verbose?: boolean;
}

/** Where the program reads input, writes output and logs. */
export interface CliIo {
	read: (file: string | undefined) => Promise<string>;
	write: (text: string) => void;
	logger: Logger;
}

/** Reads `file`, or stdin when it is absent or `-`. */
export async function readInput(file: string | undefined): Promise<string> {
	if (file !== undefined && file !== "-") return readFile(file, "utf8");
	const chunks: Buffer[] = [];
	for await (const chunk of process.stdin) chunks.push(Buffer.from(chunk));
	return Buffer.concat(chunks).toString("utf8");
}

/** Console backed io for the real program, logging through clog. */
export function nodeIo(): CliIo {
	const clog = createClog("fsm-codegen");
	return {
		read: readInput,
		write: (text) => process.stdout.write(text),
		logger: {
			debug: (...args: unknown[]) => clog.debug(...args),
			log: (...args: unknown[]) => clog.log(...args),
			warn: (...args: unknown[]) => clog.warn(...args),
			error: (...args: unknown[]) => clog.error(...args),
		},
	};
}

/**
 * Parses `text` in the given language. `name`, when given, replaces the
 * machine name the input declares.
 */
export function parseInput(
	text: string,
	language: InputLanguage,
	name?: string
): { graph: Graph; options: GenerateOptions } {
	const { graph, options } = parseByLanguage(text, language);
	return {
		graph: name ? Object.freeze({ ...graph, name }) : graph,
		options,
	};
}

function parseByLanguage(
	text: string,
	language: InputLanguage
): { graph: Graph; options: GenerateOptions } {
	switch (language) {
		case "dsl":
			return parseDsl(text);
		case "dot":
			return { graph: fromDot(text), options: {} };
		case "mermaid":
			return { graph: fromMermaid(text), options: {} };
	}
}

/**
 * Renders the graph to SVG with graphviz `dot`, wrapped in a `<div>` so that
 * documentation tools rendering HTML display it.
 * @throws Error if `dot` cannot be run or fails
 */
export function renderSvg(graph: Graph): string {
	const result = spawnSync("dot", ["-Tsvg"], {
		input: toDot(graph),
		encoding: "utf8",
	});
	if (result.error) {
		throw new Error(`Cannot run graphviz "dot": ${result.error.message}`, {
			cause: result.error,
		});
	}
	if (result.status !== 0) {
		throw new Error(
			`graphviz "dot" exited with status ${result.status}: ${result.stderr.trim()}`
		);
	}
	// drop the xml prolog and doctype
	const start = result.stdout.indexOf("<svg");
	return `<div>${result.stdout.slice(Math.max(0, start)).trim()}</div>`;
}

function diagramOptions(
	opts: CliOptions,
	graph: Graph,
	debugLog: (...args: unknown[]) => void
): Pick<GenerateOptions, "diagram" | "renderDiagram"> {
	const fallback = { diagram: opts.diagram ?? false };
	if (opts.svg === "omit") return fallback;
	try {
		const svg = renderSvg(graph);
		return { diagram: true, renderDiagram: () => svg };
	} catch (error) {
		if (opts.svg === "force") throw error;
		debugLog(
			"svg rendering skipped:",
			error instanceof Error ? error.message : String(error)
		);
		return fallback;
	}
}

/**
 * Runs the whole pipeline over `text` and returns what the program prints.
 * @throws ParseError, GraphError or GraphValidationError on bad input
 */
export function run(
	text: string,
	opts: CliOptions,
	logger: Logger = defaultLogger
): string {
	const debugLog = createDebugLog({ debug: opts.verbose ?? false, logger });
	const { graph, options } = parseInput(text, opts.language, opts.name);
	debugLog(
		`parsed ${opts.language} input "${graph.name}": ${graph.vertices.length} vertices, ${graph.edges.length} edges`
	);

	if (opts.emit === "mermaid") return toMermaid(graph);
	if (opts.emit === "dot") return toDot(graph);

	return generate(graph, {
		...options,
		...diagramOptions(opts, graph, debugLog),
		visibility: opts.local ? "local" : options.visibility,
		stateTypeName: opts.state,
		entryTypeName: opts.entry,
		safety: opts.safety,
		renameMethods: opts.renameMethods,
		methodCase: opts.methodCase,
		annotations: opts.annotate,
		indent: opts.indent.replace(/\\t/g, "\t"),
		debug: opts.verbose ?? false,
		logger,
	});
}

/**
 * Lines to print for an error which ended the program:
 * ```
 * ✗ Main error message
 *
 * → Detail 1
 * → Detail 2
 * ```
 */
export function formatCliError(error: unknown): string[] {
	if (error instanceof GraphValidationError) {
		const count = error.diagnostics.length;
		return [
			`✗ The graph is invalid (${count} problem${count === 1 ? "" : "s"})`,
			"",
			...error.diagnostics.map((d) => `→ ${formatDiagnostic(d)}`),
		];
	}
	if (error instanceof Error) {
		return [`✗ ${error.message}`];
	}
	return [`✗ ${String(error)}`];
}

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

/**
 * Builds the `fsm-codegen` command.
 *
 * @example
 * ```typescript
 * await createProgram().parseAsync(process.argv);
 * ```
 */
export function createProgram(io: CliIo = nodeIo()): Command {
	return new Command()
		.name("fsm-codegen")
		.description(
			"Generate a typed state machine with a per-state handle API from a graph description"
		)
		.argument("[file]", "input file, stdin when absent or -")
		.addOption(
			new Option("-l, --language <language>", "input language")
				.choices(["dsl", "dot", "mermaid"])
				.default("dsl")
		)
		.option("--name <name>", "machine name, replacing the one the input declares")
		.option("--entry <name>", "entry type name (default: <Name>Entry)")
		.option("--state <name>", "state type name (default: <Name>State)")
		.addOption(
			new Option("--safety <mode>", "handle safety mode")
				.choices(["checked", "trusted"])
				.default("checked")
		)
		.option(
			"--no-rename-methods",
			"name transition methods exactly like their target vertex"
		)
		.addOption(
			new Option("--method-case <case>", "case of renamed transition methods")
				.choices(["camel", "snake"])
				.default("camel")
		)
		.option("--local", "do not export the generated declarations")
		.option("--diagram", "embed a mermaid diagram in the entry type docs")
		.addOption(
			new Option("--svg <mode>", "embed a graphviz rendering in the entry type docs")
				.choices(["auto", "force", "omit"])
				.default("omit")
		)
		.option(
			"--annotate <line>",
			"line placed before the state and entry types (repeatable)",
			collect,
			[]
		)
		.option("--indent <str>", "indentation unit, \\t for a tab", "\t")
		.addOption(
			new Option("--emit <what>", "what to print")
				.choices(["code", "mermaid", "dot"])
				.default("code")
		)
		.option("-v, --verbose", "debug logging")
		.action(async (file: string | undefined, opts: CliOptions) => {
			const text = await io.read(file);
			io.write(run(text, opts, io.logger));
		});
}
