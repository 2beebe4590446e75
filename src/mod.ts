/**
 * @module
 *
 * Generates typed state machines from a directed graph description.
 *
 * A graph lists vertices (states, optionally carrying a value of some
 * TypeScript type) and edges (transitions). The generated module contains a
 * state union, a machine class and, for every state with outgoing transitions,
 * a handle class whose methods are exactly the transitions legal from that
 * state. Illegal transitions do not type-check.
 *
 * @example Generating from the DSL
 * ```typescript
 * import { fromDsl, generate } from "fsm-codegen";
 *
 * const source = generate(fromDsl(`
 *   export TrafficLight {
 *     Green: string;
 *     Red -> RedAmber -> Green -> Amber;
 *   }
 * `));
 * ```
 *
 * @example Using the generated module
 * ```typescript
 * const light = new TrafficLight({ kind: "Red" });
 * const entry = light.entry();
 * if (entry.kind === "Red") entry.handle.redAmber();
 * ```
 *
 * @example Building a graph in code
 * ```typescript
 * import { GraphBuilder, generate } from "fsm-codegen";
 *
 * const graph = new GraphBuilder("Door")
 *   .edge({ source: "Closed", target: "Open" })
 *   .edge({ source: "Open", target: "Closed" })
 *   .build();
 * const source = generate(graph, { safety: "trusted" });
 * ```
 */

export * from "./errors.ts";
export * from "./graph.ts";
export * from "./naming.ts";
export * from "./config.ts";
export * from "./diagram.ts";
export * from "./validate.ts";
export * from "./classify.ts";
export * from "./generate.ts";
export * from "./from-dsl.ts";
export * from "./from-dot.ts";
export * from "./from-mermaid.ts";
