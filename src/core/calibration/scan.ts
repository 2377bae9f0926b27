// CHANGE: Independent first/last scanners for numerals and digit words
// WHY: Words are matched as raw substrings, so overlaps ("twone") resolve differently per direction
// FORMAT THEOREM: ∀line: findFirstWord(line).index ≤ findLastWord(line).index when both exist
// PURITY: CORE
// INVARIANT: Returned index is the occurrence's first character in the line
// COMPLEXITY: O(|DIGIT_WORDS| · n) for words, O(n) for numerals where n = |line|

import { Option } from "effect";

import type { DigitOccurrence } from "../models.js";
import { DIGIT_WORDS, isNumeral, wordToNumeral } from "./digits.js";

const numeralAt = (
	line: string,
	index: number,
): Option.Option<DigitOccurrence> => {
	const char = line.charAt(index);
	return isNumeral(char)
		? Option.some({ numeral: char, index, source: "numeral" as const })
		: Option.none();
};

const wordAt = (
	word: string,
	index: number,
): Option.Option<DigitOccurrence> =>
	index === -1
		? Option.none()
		: Option.map(wordToNumeral(word), (numeral) => ({
				numeral,
				index,
				source: "word" as const,
			}));

/**
 * Leftmost ASCII numeral in the line.
 *
 * @pure true
 * @complexity O(n)
 */
export function findFirstNumeral(line: string): Option.Option<DigitOccurrence> {
	for (let index = 0; index < line.length; index++) {
		const found = numeralAt(line, index);
		if (Option.isSome(found)) return found;
	}
	return Option.none();
}

/**
 * Rightmost ASCII numeral in the line.
 *
 * @pure true
 * @complexity O(n)
 */
export function findLastNumeral(line: string): Option.Option<DigitOccurrence> {
	for (let index = line.length - 1; index >= 0; index--) {
		const found = numeralAt(line, index);
		if (Option.isSome(found)) return found;
	}
	return Option.none();
}

/**
 * Leftmost digit word, matched as a substring anywhere in the line.
 *
 * Each word contributes its own leftmost occurrence; the smallest index
 * across words wins, and on an equal index the word listed first in
 * DIGIT_WORDS is kept.
 *
 * @pure true
 * @invariant result.index = min { line.indexOf(w) | w ∈ DIGIT_WORDS, found }
 *
 * @example
 * ```ts
 * findFirstWord("xtwone3four"); // Some({ numeral: "2", index: 1, source: "word" })
 * ```
 */
export function findFirstWord(line: string): Option.Option<DigitOccurrence> {
	let best: Option.Option<DigitOccurrence> = Option.none();
	for (const word of DIGIT_WORDS) {
		const candidate = wordAt(word, line.indexOf(word));
		if (
			Option.isSome(candidate) &&
			(Option.isNone(best) || candidate.value.index < best.value.index)
		) {
			best = candidate;
		}
	}
	return best;
}

/**
 * Rightmost digit word, matched as a substring anywhere in the line.
 *
 * A word occurring several times only competes with its rightmost
 * occurrence; the candidate is replaced only on a strictly greater index.
 *
 * @pure true
 * @invariant result.index = max { line.lastIndexOf(w) | w ∈ DIGIT_WORDS, found }
 *
 * @example
 * ```ts
 * findLastWord("xtwone3four"); // Some({ numeral: "4", index: 7, source: "word" })
 * ```
 */
export function findLastWord(line: string): Option.Option<DigitOccurrence> {
	let best: Option.Option<DigitOccurrence> = Option.none();
	for (const word of DIGIT_WORDS) {
		const candidate = wordAt(word, line.lastIndexOf(word));
		if (
			Option.isSome(candidate) &&
			(Option.isNone(best) || candidate.value.index > best.value.index)
		) {
			best = candidate;
		}
	}
	return best;
}
