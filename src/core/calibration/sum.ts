// CHANGE: Summation of calibration values over all input lines
// FORMAT THEOREM: ∀lines without failures: sum(lines) = Σ extract(line), independent of order
// PURITY: CORE
// INVARIANT: The first line without digits aborts the whole fold; no partial sum escapes
// COMPLEXITY: O(m · |DIGIT_WORDS| · n) where m = |lines|, n = max |line|

import { Either } from "effect";

import type { MissingDigit } from "../errors.js";
import { extractCalibrationValue } from "./extract.js";

/**
 * Splits file content into trimmed lines.
 *
 * A trailing line terminator ends the last record instead of starting an
 * empty one, so "a\nb\n" gives ["a", "b"].
 *
 * @pure true
 * @complexity O(n) where n = |content|
 */
export function splitLines(content: string): readonly string[] {
	if (content.length === 0) return [];
	const lines = content.split(/\r?\n/);
	if (lines.at(-1) === "") lines.pop();
	return lines.map((line) => line.trim());
}

/**
 * Sums the calibration value of every line.
 *
 * @param lines - Trimmed lines, in input order
 * @returns Right(sum) or Left(MissingDigit) for the first offending line (1-based lineNumber)
 *
 * @pure true
 * @invariant Either.isRight(result) → result.right = Σ extractCalibrationValue(l)
 *
 * @example
 * ```ts
 * sumCalibrationValues(["1abc2", "twone"]); // Either.right(33)
 * ```
 */
export function sumCalibrationValues(
	lines: readonly string[],
): Either.Either<number, MissingDigit> {
	let sum = 0;
	for (const [offset, line] of lines.entries()) {
		const value = extractCalibrationValue(line, offset + 1);
		if (Either.isLeft(value)) return Either.left(value.left);
		sum += value.right;
	}
	return Either.right(sum);
}
