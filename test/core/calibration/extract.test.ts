// CHANGE: Deterministic and property-based specs for calibration extraction
// FORMAT THEOREM: ∀line with ≥1 digit: extract(line) = 10·first(line) + last(line)
// PURITY: CORE
// INVARIANT: A line without digits is MissingDigit, never 0
// COMPLEXITY: O(n) per assertion

import { Effect, Either, Option } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { DIGIT_WORDS } from "../../../src/core/calibration/digits.js";
import {
	extractCalibrationValue,
	extractCalibrationValueEffect,
	firstDigit,
	lastDigit,
} from "../../../src/core/calibration/extract.js";
import { MissingDigit } from "../../../src/core/errors.js";

const valueOf = (line: string): number =>
	Either.getOrThrow(extractCalibrationValue(line));

const failureOf = (line: string, lineNumber?: number): MissingDigit =>
	Either.getOrThrow(Either.flip(extractCalibrationValue(line, lineNumber)));

const NUMERAL_CHARS = ["0", "1", "2", "3", "4", "5", "6", "7", "8", "9"];
// Letters that cannot spell any digit word
const FILLER_CHARS = ["x", "q", "z"];

const numeralToken = fc.constantFrom(...NUMERAL_CHARS);
const wordToken = fc.constantFrom(...DIGIT_WORDS);
const fillerToken = fc.constantFrom(...FILLER_CHARS);
const digitToken = fc.oneof(numeralToken, wordToken);
const anyToken = fc.oneof(numeralToken, wordToken, fillerToken);

const digitBearingLine = fc
	.tuple(fc.array(fillerToken), digitToken, fc.array(anyToken))
	.map(([lead, digit, rest]) => [...lead, digit, ...rest].join(""));

describe("firstDigit / lastDigit", () => {
	it("lets an earlier numeral beat a later word", () => {
		expect(Option.getOrNull(firstDigit("4nineeightseven2"))).toEqual({
			numeral: "4",
			index: 0,
			source: "numeral",
		});
	});

	it("lets a later word beat an earlier numeral", () => {
		expect(Option.getOrNull(lastDigit("7pqrstsixteen"))).toEqual({
			numeral: "6",
			index: 6,
			source: "word",
		});
	});

	it("falls back to whichever kind exists", () => {
		expect(Option.getOrNull(firstDigit("xx5"))?.source).toBe("numeral");
		expect(Option.getOrNull(lastDigit("xxfive"))?.source).toBe("word");
	});

	it("returns none for lines without digits", () => {
		expect(Option.isNone(firstDigit("abc"))).toBe(true);
		expect(Option.isNone(lastDigit("abc"))).toBe(true);
	});
});

describe("extractCalibrationValue", () => {
	it("combines first and last numerals", () => {
		expect(valueOf("1abc2")).toBe(12);
	});

	it("reads spelled-out and mixed digits", () => {
		expect(valueOf("two1nine")).toBe(29);
		expect(valueOf("eightwothree")).toBe(83);
		expect(valueOf("abcone2threexyz")).toBe(13);
		expect(valueOf("xtwone3four")).toBe(24);
		expect(valueOf("4nineeightseven2")).toBe(42);
		expect(valueOf("zoneight234")).toBe(14);
		expect(valueOf("7pqrstsixteen")).toBe(76);
	});

	it("reads overlapping words independently per direction", () => {
		expect(valueOf("twone")).toBe(21);
		expect(valueOf("eightwo")).toBe(82);
	});

	it("doubles a single occurrence", () => {
		expect(valueOf("7")).toBe(77);
		expect(valueOf("xsevenx")).toBe(77);
	});

	it("treats 0 as a numeral", () => {
		expect(valueOf("a0b")).toBe(0);
		expect(valueOf("0x9")).toBe(9);
	});

	it("fails with MissingDigit instead of defaulting", () => {
		const error = failureOf("zero abc", 4);
		expect(error).toBeInstanceOf(MissingDigit);
		expect(error._tag).toBe("MissingDigit");
		expect(error.line).toBe("zero abc");
		expect(error.lineNumber).toBe(4);
		expect(error.found).toBe(0);
	});

	it("fails for an empty line with lineNumber 0 by default", () => {
		expect(failureOf("").lineNumber).toBe(0);
	});
});

describe("extractCalibrationValueEffect", () => {
	it("succeeds with the value", () => {
		expect(Effect.runSync(extractCalibrationValueEffect("twone"))).toBe(21);
	});

	it("fails with MissingDigit in the error channel", () => {
		const error = Effect.runSync(
			Effect.flip(extractCalibrationValueEffect("nothing", 2)),
		);
		expect(error.lineNumber).toBe(2);
		expect(error.line).toBe("nothing");
	});
});

describe("extractCalibrationValue properties", () => {
	it("uses first and last character of numeral-only lines", () => {
		fc.assert(
			fc.property(fc.array(numeralToken, { minLength: 1 }), (chars) => {
				const line = chars.join("");
				const expected = Number.parseInt(
					`${chars[0] ?? ""}${chars[chars.length - 1] ?? ""}`,
					10,
				);
				expect(valueOf(line)).toBe(expected);
			}),
		);
	});

	it("gives equal tens and units for a single occurrence", () => {
		fc.assert(
			fc.property(
				fc.array(fillerToken),
				digitToken,
				fc.array(fillerToken),
				(lead, digit, tail) => {
					const value = valueOf([...lead, digit, ...tail].join(""));
					expect(Math.floor(value / 10)).toBe(value % 10);
				},
			),
		);
	});

	it("stays within [0, 99] for every line with a digit", () => {
		fc.assert(
			fc.property(digitBearingLine, (line) => {
				const value = valueOf(line);
				expect(value).toBeGreaterThanOrEqual(0);
				expect(value).toBeLessThanOrEqual(99);
			}),
		);
	});

	it("is a pure function of the line", () => {
		const render = (line: string): string =>
			Either.match(extractCalibrationValue(line), {
				onLeft: (error) => `missing:${error.found}`,
				onRight: (value) => `value:${value}`,
			});
		fc.assert(
			fc.property(fc.string(), (line) => {
				expect(render(line)).toBe(render(line));
			}),
		);
	});

	it("never succeeds on lines built only from filler letters", () => {
		fc.assert(
			fc.property(fc.array(fillerToken), (chars) => {
				expect(Either.isLeft(extractCalibrationValue(chars.join("")))).toBe(
					true,
				);
			}),
		);
	});
});
