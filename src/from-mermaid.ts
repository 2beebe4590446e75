import { ParseError } from "./errors.ts";
import { GraphBuilder, type Graph } from "./graph.ts";
import { isIdentifier } from "./naming.ts";

/**
 * Parses a Mermaid stateDiagram-v2 notation into a graph.
 *
 * Every state becomes a vertex without data (Mermaid has nowhere to declare a
 * payload type), every transition an edge.
 *
 * **Supported lines:**
 * - `A --> B` - transition
 * - `A --> B: label` - transition; a label which is an identifier names the method,
 *   any other label documents the transition
 * - `[*] --> A` - declares `A`
 * - `A --> [*]` - declares `A`
 * - `state "Description" as A` - declares `A` with documentation
 * - `A : Description` - documents `A`
 *
 * **Ignored Mermaid features (non-graph lines):**
 * - YAML frontmatter (`---\nconfig: ...\n---`)
 * - Comments (`%%`) and directives (`%%{...}%%`)
 * - Styling (`classDef`, `class`, `style`)
 * - Composite state delimiters (`state StateName {`, `}`); nested states are flattened
 * - Notes (`note left of`, `note right of`)
 * - Direction statements (`direction LR`, `direction TB`, etc.)
 *
 * @param mermaidDiagram - A Mermaid stateDiagram-v2 string
 * @param name - The machine name, which Mermaid cannot express
 * @throws ParseError if the header is missing or a line is not understood
 *
 * @example
 * ```typescript
 * const graph = fromMermaid(`
 *   stateDiagram-v2
 *   [*] --> Off
 *   Off --> On: switchOn
 *   On --> Off: switchOff
 * `, "Switch");
 * ```
 */
export function fromMermaid(mermaidDiagram: string, name = "StateMachine"): Graph {
	const lines = mermaidDiagram.split("\n");

	// the header may be preceded by YAML frontmatter
	const startIndex = lines.findIndex((line) =>
		/^stateDiagram(-v2)?\b/.test(line.trim())
	);
	if (startIndex === -1) {
		throw new ParseError('Invalid mermaid diagram: must contain "stateDiagram-v2"', {
			line: 1,
			column: 1,
		});
	}

	const builder = new GraphBuilder(name);

	for (let i = startIndex + 1; i < lines.length; i++) {
		const raw = lines[i];
		const line = raw.trim();
		const span = { line: i + 1, column: raw.search(/\S/) + 1 };

		if (!line) continue;
		if (line.startsWith("%%")) continue;
		if (line.startsWith("direction ")) continue;
		if (/^(classDef|class|style)\s/.test(line)) continue;
		if (/^state\s+[\w$]+\s*\{$/.test(line) || line === "{" || line === "}") continue;
		if (/^note\s/.test(line)) continue;

		// state "Description" as StateName
		const described = line.match(/^state\s+"([^"]*)"\s+as\s+([\w$]+)$/);
		if (described) {
			builder.vertex({ name: described[2], doc: described[1], span });
			continue;
		}

		// [*] --> StateName  or  StateName --> [*]
		const pseudo =
			line.match(/^\[\*\]\s*-->\s*([\w$]+)$/) ??
			line.match(/^([\w$]+)\s*-->\s*\[\*\]$/);
		if (pseudo) {
			builder.vertex({ name: pseudo[1], span });
			continue;
		}

		// StateA --> StateB  or  StateA --> StateB: label
		const transition = line.match(/^([\w$]+)\s*-->\s*([\w$]+)\s*(?::(.*))?$/);
		if (transition) {
			const [, source, target, rawLabel] = transition;
			const label = rawLabel?.trim() ?? "";
			builder.edge({
				source,
				target,
				methodName: label && isIdentifier(label) ? label : null,
				doc: label && !isIdentifier(label) ? label : undefined,
				span,
			});
			continue;
		}

		// StateName : Description
		const note = line.match(/^([\w$]+)\s*:\s*(.+)$/);
		if (note) {
			builder.vertex({ name: note[1], doc: note[2].trim(), span });
			continue;
		}

		throw new ParseError(`Unrecognized mermaid line "${line}"`, span);
	}

	return builder.build();
}
