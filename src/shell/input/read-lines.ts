// CHANGE: Read the whole input file into trimmed lines
// PURITY: SHELL (file system)
// EFFECT: Effect<readonly string[], FSError, never>
// INVARIANT: Whole file is read before any line is processed; no streaming
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";

import { Effect } from "effect";

import { splitLines } from "../../core/calibration/sum.js";
import { FSError } from "../../core/errors.js";

const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Reads a UTF-8 file and splits it into trimmed lines.
 *
 * @param filePath - Absolute or cwd-relative path
 * @returns Effect with the lines or FSError when the file cannot be read
 *
 * @pure false (reads the file system)
 * @effect Effect<readonly string[], FSError>
 */
export function readInputLines(
	filePath: string,
): Effect.Effect<readonly string[], FSError> {
	return Effect.try({
		try: () => fs.readFileSync(filePath, "utf8"),
		catch: (error) =>
			new FSError({ path: filePath, detail: describeError(error) }),
	}).pipe(Effect.map(splitLines));
}
