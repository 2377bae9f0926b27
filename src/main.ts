// CHANGE: Thin APP delegator for programmatic usage
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { defaultConfig, runCalibration } from "./app/runCalibration.js";
import type { ExitCode } from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param cwd - Directory the input path is resolved against
 * @returns ExitCode (0 | 1)
 */
export async function main(cwd: string = process.cwd()): Promise<ExitCode> {
	return Effect.runPromise(runCalibration(defaultConfig(cwd)));
}
