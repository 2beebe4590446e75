import { mermaidBlock, type DiagramRenderer } from "./diagram.ts";
import type { MethodCase } from "./naming.ts";

/**
 * Logger interface compatible with console and @marianmeres/clog.
 * All methods accept variadic arguments; return values are ignored.
 */
export interface Logger {
	debug: (...args: unknown[]) => unknown;
	log: (...args: unknown[]) => unknown;
	warn: (...args: unknown[]) => unknown;
	error: (...args: unknown[]) => unknown;
}

/**
 * Default console-based logger.
 */
export const defaultLogger: Logger = {
	debug: (...args: unknown[]) => console.debug(...args),
	log: (...args: unknown[]) => console.log(...args),
	warn: (...args: unknown[]) => console.warn(...args),
	error: (...args: unknown[]) => console.error(...args),
};

/**
 * - `checked`: every handle method verifies the machine is still in the handle's state
 *   and throws otherwise
 * - `trusted`: no verification; a handle used against another state is a caller bug
 */
export type SafetyMode = "checked" | "trusted";

/** `export` emits the declaration as exported, `local` keeps it module private. */
export type Visibility = "export" | "local";

/**
 * Options recognized by the generator. Everything is optional.
 */
export type GenerateOptions = {
	/** Name of the state union (default: `<Name>State`) */
	stateTypeName?: string;
	/** Name of the entry union (default: `<Name>Entry`) */
	entryTypeName?: string;
	/** Visibility of the machine, state and slot types (default: `export`) */
	visibility?: Visibility;
	/**
	 * Visibility of the entry type and handles (default: same as `visibility`).
	 * A value other than `visibility` leaves exported declarations referring to
	 * local ones, which `declaration` builds of the generated module reject.
	 */
	entryVisibility?: Visibility;
	/** Default: `checked` */
	safety?: SafetyMode;
	/**
	 * When `false`, a transition method is named exactly like its target vertex
	 * (default: `true`)
	 */
	renameMethods?: boolean;
	/** Case used when renaming methods (default: `camel`) */
	methodCase?: MethodCase;
	/** Embed a diagram in the entry type docs (default: `false`) */
	diagram?: boolean;
	/** Produces the embedded diagram; returning `null` skips it (default: fenced mermaid) */
	renderDiagram?: DiagramRenderer;
	/** Lines placed verbatim before the state and entry type declarations */
	annotations?: string[];
	/** Indentation unit (default: tab) */
	indent?: string;
	/** Emit the "generated" banner (default: `true`) */
	header?: boolean;
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?: Logger;
};

/**
 * Options with every default applied, plus the derived type names.
 */
export type ResolvedOptions = {
	machineName: string;
	stateTypeName: string;
	slotTypeName: string;
	entryTypeName: string;
	visibility: Visibility;
	entryVisibility: Visibility;
	safety: SafetyMode;
	renameMethods: boolean;
	methodCase: MethodCase;
	diagram: boolean;
	renderDiagram: DiagramRenderer;
	annotations: string[];
	indent: string;
	header: boolean;
	debug: boolean;
	logger: Logger;
};

/** Module level helper emitted in checked mode. */
export const MISMATCH_HELPER = "mismatchedState";

/** Module private symbol gating handle construction in trusted mode. */
export const HANDLE_TOKEN = "handleToken";

/**
 * Applies defaults to `options` for a machine called `machineName`.
 */
export function resolveOptions(
	machineName: string,
	options: GenerateOptions = {},
): ResolvedOptions {
	const visibility = options.visibility ?? "export";
	return {
		machineName,
		stateTypeName: options.stateTypeName ?? `${machineName}State`,
		slotTypeName: `${machineName}Slot`,
		entryTypeName: options.entryTypeName ?? `${machineName}Entry`,
		visibility,
		entryVisibility: options.entryVisibility ?? visibility,
		safety: options.safety ?? "checked",
		renameMethods: options.renameMethods ?? true,
		methodCase: options.methodCase ?? "camel",
		diagram: options.diagram ?? false,
		renderDiagram: options.renderDiagram ?? mermaidBlock,
		annotations: [...(options.annotations ?? [])],
		indent: options.indent ?? "\t",
		header: options.header ?? true,
		debug: options.debug ?? false,
		logger: options.logger ?? defaultLogger,
	};
}

/**
 * Returns a debug log function which is a no-op unless `debug` is on.
 */
export function createDebugLog(
	options: Pick<ResolvedOptions, "debug" | "logger">,
): (...args: unknown[]) => void {
	return (...args: unknown[]) => {
		if (options.debug) {
			options.logger.debug("[fsm-codegen]", ...args);
		}
	};
}
