// CHANGE: Specs for harness configuration layering and validation
// PURITY: CORE
// INVARIANT: validate({}) = defaults; the first invalid field is reported

import { describe, expect, it } from "vitest";

import {
	DEFAULT_HARNESS_CONFIG,
	type HarnessConfigInput,
	mergeConfigInputs,
	validateHarnessConfig,
} from "../../src/core/config.js";
import * as Result from "../../src/core/result.js";

const expectInvalid = (
	input: HarnessConfigInput,
	field: string,
	detail: string,
): void => {
	const result = validateHarnessConfig(input);
	expect(Result.isFailure(result)).toBe(true);
	if (Result.isFailure(result)) {
		expect(result.error._tag).toBe("InvalidConfig");
		expect(result.error.field).toBe(field);
		expect(result.error.detail).toBe(detail);
	}
};

describe("validateHarnessConfig", () => {
	it("falls back to the defaults for an empty input", () => {
		expect(validateHarnessConfig({})).toEqual(Result.success(DEFAULT_HARNESS_CONFIG));
		expect(DEFAULT_HARNESS_CONFIG.trials).toBe(100);
		expect(DEFAULT_HARNESS_CONFIG.shrink).toBe(false);
	});

	it("applies every supplied field", () => {
		expect(
			validateHarnessConfig({
				trials: 25,
				minInt: -5,
				maxInt: 5,
				minLength: 1,
				maxLength: 3,
				seed: 99,
				shrink: true,
				subjects: ["optional"],
				laws: ["monad-left-identity"],
			}),
		).toEqual(
			Result.success({
				trials: 25,
				integerRange: { min: -5, max: 5 },
				lengthRange: { min: 1, max: 3 },
				seed: 99,
				shrink: true,
				subjects: ["optional"],
				laws: ["monad-left-identity"],
			}),
		);
	});

	it("rejects a non-positive trial count", () => {
		expectInvalid({ trials: 0 }, "trials", "expected an integer in [1, 2147483647], got 0");
	});

	it("rejects a fractional trial count", () => {
		expectInvalid(
			{ trials: 2.5 },
			"trials",
			"expected an integer in [1, 2147483647], got 2.5",
		);
	});

	it("rejects an inverted integer range", () => {
		expectInvalid({ minInt: 5, maxInt: 1 }, "integerRange", "min 5 exceeds max 1");
	});

	it("rejects integers outside the 32-bit range", () => {
		expectInvalid(
			{ maxInt: 2 ** 31 },
			"integerRange.max",
			"expected an integer in [-2147483648, 2147483647], got 2147483648",
		);
	});

	it("rejects a negative minimum length", () => {
		expectInvalid(
			{ minLength: -1 },
			"lengthRange.min",
			"expected an integer in [0, 10000], got -1",
		);
	});

	it("rejects sequence lengths above the practical maximum", () => {
		expectInvalid(
			{ minLength: 2_000_000_000 },
			"lengthRange.min",
			"expected an integer in [0, 10000], got 2000000000",
		);
		expectInvalid(
			{ maxLength: 10_001 },
			"lengthRange.max",
			"expected an integer in [0, 10000], got 10001",
		);
	});

	it("rejects a minimum length above the default maximum", () => {
		expectInvalid({ minLength: 11 }, "lengthRange", "min 11 exceeds max 10");
	});

	it("rejects a fractional seed", () => {
		expectInvalid(
			{ seed: 1.5 },
			"seed",
			"expected an integer in [-2147483648, 2147483647], got 1.5",
		);
	});

	it("rejects an empty subject selection", () => {
		expectInvalid({ subjects: [] }, "subjects", "at least one name is required");
	});

	it("rejects an unknown subject", () => {
		expectInvalid(
			{ subjects: ["tree"] },
			"subjects",
			'unknown name "tree" (known: sequence, optional, result)',
		);
	});

	it("rejects an unknown law", () => {
		expectInvalid(
			{ laws: ["applicative-identity"] },
			"laws",
			'unknown name "applicative-identity" (known: functor-identity, functor-composition, monad-left-identity, monad-right-identity, monad-associativity)',
		);
	});

	it("deduplicates names and keeps the requested order", () => {
		const result = validateHarnessConfig({
			subjects: ["result", "optional", "result"],
		});
		expect(Result.map(result, (config) => config.subjects)).toEqual(
			Result.success(["result", "optional"]),
		);
	});

	it("reports the first invalid field only", () => {
		expectInvalid(
			{ trials: -1, subjects: [] },
			"trials",
			"expected an integer in [1, 2147483647], got -1",
		);
	});
});

describe("mergeConfigInputs", () => {
	it("prefers the override field by field", () => {
		expect(
			mergeConfigInputs(
				{ trials: 10, seed: 5, subjects: ["sequence"] },
				{ trials: 20, shrink: true },
			),
		).toEqual({ trials: 20, seed: 5, subjects: ["sequence"], shrink: true });
	});

	it("keeps the base when the override is empty", () => {
		expect(mergeConfigInputs({ maxInt: 7 }, {})).toEqual({ maxInt: 7 });
	});
});
