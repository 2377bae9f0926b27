// CHANGE: Application layer orchestration (APP) for the calibration run
// WHY: APP composes pure CORE logic with SHELL integrations and returns the exit code as a value
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; a failure on any line aborts the whole run
// COMPLEXITY: O(m · n) where m = lines, n = max line length

import * as path from "node:path";

import { Effect } from "effect";

import { sumCalibrationValues } from "../core/calibration/sum.js";
import type { CalibrationConfig, ExitCode } from "../core/models.js";
import { readInputLines } from "../shell/input/index.js";
import { printSum, reportFailure } from "../shell/output/index.js";

/**
 * Relative location of the input file.
 */
export const DEFAULT_INPUT_PATH = "res/data.txt";

/**
 * Built-in configuration; nothing is read from flags or the environment.
 *
 * @pure true
 */
export const defaultConfig = (cwd: string): CalibrationConfig => ({
	cwd,
	inputPath: DEFAULT_INPUT_PATH,
});

/**
 * Reads the input, sums calibration values and prints the result.
 *
 * @param config - Where the input lives
 * @returns Effect<ExitCode, never>: 0 after printing the sum, 1 after reporting a failure
 *
 * @pure false (file system and console), but does not terminate the process
 * @invariant ExitCode ∈ {0,1}
 * @postcondition result = 0 ↔ "Sum is <N>" was printed
 */
export function runCalibration(
	config: CalibrationConfig,
): Effect.Effect<ExitCode, never> {
	const inputPath = path.resolve(config.cwd, config.inputPath);

	return Effect.gen(function* (_) {
		const lines = yield* _(readInputLines(inputPath));
		const sum = yield* _(sumCalibrationValues(lines));
		yield* _(printSum(sum));
		return 0 as const;
	}).pipe(
		Effect.catchAll((error) =>
			reportFailure(error).pipe(Effect.as(1 as const)),
		),
	);
}
