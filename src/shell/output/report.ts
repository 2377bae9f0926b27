// CHANGE: Console reporting for the calibration run
// PURITY: SHELL (console I/O); formatters are pure
// INVARIANT: The sum goes to stdout, failures to stderr, one line each
// COMPLEXITY: O(1)

import { Effect } from "effect";
import { match } from "ts-pattern";

import type { AppError } from "../../core/errors.js";

/**
 * @pure true
 */
export const formatSum = (sum: number): string => `Sum is ${sum}`;

/**
 * Renders an application error as a single diagnostic line.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatFailure(new MissingDigit({ line: "abc", lineNumber: 3, found: 0 }));
 * // => 'Line 3 has no digit: "abc"'
 * ```
 */
export const formatFailure = (error: AppError): string =>
	match(error)
		.with(
			{ _tag: "FS" },
			(e) => `Couldn't read input: ${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "MissingDigit" },
			(e) => `Line ${e.lineNumber} has no digit: "${e.line}"`,
		)
		.exhaustive();

/**
 * @effect Effect<void, never, never>
 */
export const printSum = (sum: number): Effect.Effect<void> =>
	Effect.sync(() => {
		console.log(formatSum(sum));
	});

/**
 * @effect Effect<void, never, never>
 */
export const reportFailure = (error: AppError): Effect.Effect<void> =>
	Effect.sync(() => {
		console.error(formatFailure(error));
	});
