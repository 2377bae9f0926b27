// CHANGE: Domain models for calibration extraction (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the calibration process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Single decimal numeral character.
 *
 * @invariant numeral.length = 1
 */
export type Numeral = "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9";

/**
 * Where a digit occurrence came from: an ASCII numeral or a spelled-out word.
 */
export type DigitSource = "numeral" | "word";

/**
 * Digit found in a line.
 *
 * @remarks
 * - @pure true
 * - @invariant index ≥ 0 ∧ index < |line|
 * - index is the position of the occurrence's first character
 */
export interface DigitOccurrence {
	readonly numeral: Numeral;
	readonly index: number;
	readonly source: DigitSource;
}

/**
 * Two-digit value formed from a line's first and last digit.
 *
 * @invariant 0 ≤ value ≤ 99
 */
export type CalibrationValue = number;

/**
 * Built-in location of the input file.
 *
 * @remarks
 * - @invariant inputPath is resolved against cwd when relative
 */
export interface CalibrationConfig {
	readonly cwd: string;
	readonly inputPath: string;
}
