#!/usr/bin/env -S node --import tsx
/**
 * @module
 *
 * CLI script generating a typed state machine module from a graph description.
 *
 * @example Usage via npm script
 * ```sh
 * npm run fsm-codegen -- traffic-light.fsm > traffic-light.ts
 * npm run fsm-codegen -- --language mermaid --name Door door.mermaid
 * ```
 *
 * @example Direct usage
 * ```sh
 * cat door.dot | scripts/fsm-codegen.ts --language dot --safety trusted
 * scripts/fsm-codegen.ts --emit mermaid traffic-light.fsm
 * ```
 *
 * Run with `--help` for every option.
 */

import { createProgram, formatCliError } from "../src/cli.ts";

try {
	await createProgram().parseAsync(process.argv);
} catch (error) {
	for (const line of formatCliError(error)) console.error(line);
	process.exit(1);
}
