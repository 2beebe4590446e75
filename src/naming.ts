import type { Edge } from "./graph.ts";

/** Case applied to method names derived from target vertices. */
export type MethodCase = "camel" | "snake";

/** The subset of the options that affects method names. */
export type MethodNaming = {
	renameMethods: boolean;
	methodCase: MethodCase;
};

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** Whether `name` can be used as a TypeScript identifier or member name. */
export function isIdentifier(name: string): boolean {
	return IDENTIFIER.test(name);
}

/**
 * Splits an identifier into words on underscores, lower-to-upper boundaries
 * and the end of acronyms: `HTTPServer_Ready` → `["HTTP", "Server", "Ready"]`.
 */
export function splitWords(name: string): string[] {
	return name
		.replace(/([a-z0-9])([A-Z])/g, "$1 $2")
		.replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
		.split(/[\s_$]+/)
		.filter(Boolean);
}

/** `RedAmber` → `redAmber` */
export function camelCase(name: string): string {
	const words = splitWords(name);
	if (!words.length) return name;
	return words
		.map((w, i) =>
			i === 0 ? w.toLowerCase() : w[0].toUpperCase() + w.slice(1).toLowerCase()
		)
		.join("");
}

/** `RedAmber` → `red_amber` */
export function snakeCase(name: string): string {
	const words = splitWords(name);
	if (!words.length) return name;
	return words.map((w) => w.toLowerCase()).join("_");
}

/**
 * Default method name for a transition into `target`.
 */
export function defaultMethodName(target: string, naming: MethodNaming): string {
	if (!naming.renameMethods) return target;
	return naming.methodCase === "snake" ? snakeCase(target) : camelCase(target);
}

/**
 * The method name an edge resolves to: its explicit override, or the default
 * derived from its target.
 */
export function resolveMethodName(edge: Edge, naming: MethodNaming): string {
	return edge.methodName ?? defaultMethodName(edge.target, naming);
}

/** Name of the handle class generated for an active vertex. */
export function handleClassName(vertex: string): string {
	return `${vertex}Handle`;
}
