// CHANGE: Typed domain error ADT for calibration using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Line contains no numeral and no digit word, so no two-digit value exists.
 *
 * @pure true (Data class)
 * @invariant lineNumber ≥ 1 when known; 0 when the line was extracted in isolation
 */
export class MissingDigit extends Data.TaggedError("MissingDigit")<{
	readonly line: string;
	readonly lineNumber: number;
	readonly found: number;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError = FSError | MissingDigit;
