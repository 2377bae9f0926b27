// CHANGE: Line calibration extractor: first/last digit selection and two-digit value
// WHY: Numerals and words are scanned independently; the winner per direction is decided by index
// FORMAT THEOREM: ∀line with ≥1 digit: extract(line) = 10·first(line) + last(line)
// PURITY: CORE
// INVARIANT: Numeral wins only on a strictly earlier (first) / strictly later (last) index
// COMPLEXITY: O(|DIGIT_WORDS| · n) where n = |line|

import { Effect, Either, Option } from "effect";
import { match } from "ts-pattern";

import { MissingDigit } from "../errors.js";
import type { CalibrationValue, DigitOccurrence } from "../models.js";
import {
	findFirstNumeral,
	findFirstWord,
	findLastNumeral,
	findLastWord,
} from "./scan.js";

type NumeralWins = (numeralIndex: number, wordIndex: number) => boolean;

const pickDigit = (
	numeral: Option.Option<DigitOccurrence>,
	word: Option.Option<DigitOccurrence>,
	numeralWins: NumeralWins,
): Option.Option<DigitOccurrence> =>
	match([numeral, word] as const)
		.with([{ _tag: "Some" }, { _tag: "Some" }], ([n, w]) =>
			Option.some(numeralWins(n.value.index, w.value.index) ? n.value : w.value),
		)
		.with([{ _tag: "Some" }, { _tag: "None" }], ([n]) => Option.some(n.value))
		.with([{ _tag: "None" }, { _tag: "Some" }], ([, w]) => Option.some(w.value))
		.with([{ _tag: "None" }, { _tag: "None" }], () => Option.none())
		.exhaustive();

/**
 * First digit of the line, numeral or word.
 *
 * @pure true
 * @postcondition both kinds found ∧ numeral.index < word.index → numeral, otherwise word
 * @complexity O(|DIGIT_WORDS| · n)
 */
export function firstDigit(line: string): Option.Option<DigitOccurrence> {
	return pickDigit(
		findFirstNumeral(line),
		findFirstWord(line),
		(numeralIndex, wordIndex) => numeralIndex < wordIndex,
	);
}

/**
 * Last digit of the line, numeral or word.
 *
 * @pure true
 * @postcondition both kinds found ∧ numeral.index > word.index → numeral, otherwise word
 * @complexity O(|DIGIT_WORDS| · n)
 */
export function lastDigit(line: string): Option.Option<DigitOccurrence> {
	return pickDigit(
		findLastNumeral(line),
		findLastWord(line),
		(numeralIndex, wordIndex) => numeralIndex > wordIndex,
	);
}

/**
 * Extracts the calibration value of a single line.
 *
 * The first and last numeral characters are concatenated and the pair must
 * be exactly two characters long before it is parsed; a line without any
 * digit is a contract violation reported as MissingDigit, never as 0.
 *
 * @param line - Trimmed line of input
 * @param lineNumber - 1-based position in the input, 0 when unknown
 * @returns Right(value ∈ [0, 99]) or Left(MissingDigit)
 *
 * @pure true
 * @invariant Either.isRight(result) → 0 ≤ result.right ≤ 99
 * @complexity O(|DIGIT_WORDS| · n)
 *
 * @example
 * ```ts
 * extractCalibrationValue("twone");   // Either.right(21)
 * extractCalibrationValue("ab7cd");     // Either.right(77)
 * extractCalibrationValue("abc");     // Either.left(MissingDigit)
 * ```
 */
export function extractCalibrationValue(
	line: string,
	lineNumber = 0,
): Either.Either<CalibrationValue, MissingDigit> {
	const digits = [firstDigit(line), lastDigit(line)]
		.filter(Option.isSome)
		.map((digit) => digit.value.numeral)
		.join("");

	if (digits.length !== 2) {
		return Either.left(
			new MissingDigit({ line, lineNumber, found: digits.length }),
		);
	}
	return Either.right(Number.parseInt(digits, 10));
}

/**
 * Effect variant of extractCalibrationValue for pipeline composition.
 *
 * @effect Effect<CalibrationValue, MissingDigit, never>
 * @complexity O(|DIGIT_WORDS| · n)
 */
export const extractCalibrationValueEffect = (
	line: string,
	lineNumber = 0,
): Effect.Effect<CalibrationValue, MissingDigit> =>
	Either.match(extractCalibrationValue(line, lineNumber), {
		onLeft: (error) => Effect.fail(error),
		onRight: (value) => Effect.succeed(value),
	});
