// CHANGE: Digit vocabulary shared by the scanners
// PURITY: CORE
// INVARIANT: DIGIT_WORDS[i] spells the value i + 1
// COMPLEXITY: O(1) lookups over a fixed nine-entry table

import { Option } from "effect";

import type { Numeral } from "../models.js";

/**
 * Spelled-out digits, ordered by value. "zero" is intentionally absent.
 */
export const DIGIT_WORDS = [
	"one",
	"two",
	"three",
	"four",
	"five",
	"six",
	"seven",
	"eight",
	"nine",
] as const;

export type DigitWord = (typeof DIGIT_WORDS)[number];

const NUMERALS: readonly Numeral[] = [
	"0",
	"1",
	"2",
	"3",
	"4",
	"5",
	"6",
	"7",
	"8",
	"9",
];

/**
 * Type guard for a single ASCII numeral character.
 *
 * @pure true
 * @complexity O(1)
 */
export function isNumeral(char: string): char is Numeral {
	return NUMERALS.some((numeral) => numeral === char);
}

/**
 * Maps a digit word to its numeral by 1-based position in DIGIT_WORDS.
 *
 * @returns Option.none() for anything that is not one of the nine words
 *
 * @pure true
 * @invariant wordToNumeral(DIGIT_WORDS[i]) = Some(String(i + 1))
 * @complexity O(1)
 *
 * @example
 * ```ts
 * wordToNumeral("seven"); // Option.some("7")
 * wordToNumeral("zero");  // Option.none()
 * ```
 */
export function wordToNumeral(word: string): Option.Option<Numeral> {
	const position = DIGIT_WORDS.findIndex((digitWord) => digitWord === word);
	return position === -1
		? Option.none()
		: Option.fromNullable(NUMERALS[position + 1]);
}
