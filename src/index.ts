// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed errors or APP orchestration
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Calibration run for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { defaultConfig, runCalibration } from "calibration-sum";
 *
 * const exitCode = await Effect.runPromise(
 *   runCalibration(defaultConfig(process.cwd())),
 * );
 * ```
 */
export {
	DEFAULT_INPUT_PATH,
	defaultConfig,
	runCalibration,
} from "./app/runCalibration.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	CalibrationConfig,
	CalibrationValue,
	DigitOccurrence,
	DigitSource,
	ExitCode,
	Numeral,
} from "./core/models.js";
export { type AppError, FSError, MissingDigit } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	DIGIT_WORDS,
	type DigitWord,
	isNumeral,
	wordToNumeral,
} from "./core/calibration/digits.js";
export {
	extractCalibrationValue,
	extractCalibrationValueEffect,
	firstDigit,
	lastDigit,
} from "./core/calibration/extract.js";
export {
	findFirstNumeral,
	findFirstWord,
	findLastNumeral,
	findLastWord,
} from "./core/calibration/scan.js";
export { splitLines, sumCalibrationValues } from "./core/calibration/sum.js";
