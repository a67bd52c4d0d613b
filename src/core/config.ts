// CHANGE: Harness configuration defaults, layering and validation
// PURITY: CORE
// FORMAT THEOREM: validate(input) = Success(cfg) ⇒ cfg satisfies every HarnessConfig invariant
// INVARIANT: Validation stops at the first invalid field (Result short-circuit)
// COMPLEXITY: O(s + l) where s = |subjects|, l = |laws|

import { pipe } from "effect";

import { InvalidConfig } from "./errors.js";
import {
	type HarnessConfig,
	type IntRange,
	LAW_NAMES,
	type LawName,
	SUBJECT_NAMES,
	type SubjectName,
} from "./models.js";
import * as Result from "./result.js";

/**
 * Unvalidated configuration fragment (CLI flags, config file).
 *
 * Absent fields fall back to the next layer, then to the defaults.
 */
export interface HarnessConfigInput {
	readonly trials?: number | undefined;
	readonly minInt?: number | undefined;
	readonly maxInt?: number | undefined;
	readonly minLength?: number | undefined;
	readonly maxLength?: number | undefined;
	readonly seed?: number | undefined;
	readonly shrink?: boolean | undefined;
	readonly subjects?: readonly string[] | undefined;
	readonly laws?: readonly string[] | undefined;
}

export const DEFAULT_HARNESS_CONFIG: HarnessConfig = {
	trials: 100,
	integerRange: { min: -1000, max: 1000 },
	lengthRange: { min: 0, max: 10 },
	seed: undefined,
	shrink: false,
	subjects: SUBJECT_NAMES,
	laws: LAW_NAMES,
};

// fast-check integer arbitraries are limited to 32-bit signed values
const INT32: IntRange = { min: -(2 ** 31), max: 2 ** 31 - 1 };

// every trial materialises a sequence of up to this many elements
export const MAX_SEQUENCE_LENGTH = 10_000;

/**
 * Overlays `override` on `base`, field by field.
 *
 * @pure true
 * @invariant merge(a, {}) = a
 * @complexity O(1)
 */
export const mergeConfigInputs = (
	base: HarnessConfigInput,
	override: HarnessConfigInput,
): HarnessConfigInput => ({
	trials: override.trials ?? base.trials,
	minInt: override.minInt ?? base.minInt,
	maxInt: override.maxInt ?? base.maxInt,
	minLength: override.minLength ?? base.minLength,
	maxLength: override.maxLength ?? base.maxLength,
	seed: override.seed ?? base.seed,
	shrink: override.shrink ?? base.shrink,
	subjects: override.subjects ?? base.subjects,
	laws: override.laws ?? base.laws,
});

const invalid = (field: string, detail: string): InvalidConfig =>
	new InvalidConfig({ field, detail });

const requireIntegerWithin = (
	field: string,
	value: number,
	bounds: IntRange,
): Result.Result<number, InvalidConfig> =>
	Number.isInteger(value) && value >= bounds.min && value <= bounds.max
		? Result.success(value)
		: Result.failure(
				invalid(
					field,
					`expected an integer in [${bounds.min}, ${bounds.max}], got ${value}`,
				),
			);

const requireRange = (
	field: string,
	range: IntRange,
	bounds: IntRange,
): Result.Result<IntRange, InvalidConfig> =>
	pipe(
		requireIntegerWithin(`${field}.min`, range.min, bounds),
		Result.flatMap((min) =>
			Result.map(
				requireIntegerWithin(`${field}.max`, range.max, bounds),
				(max) => ({ min, max }),
			),
		),
		Result.flatMap((checked) =>
			checked.min <= checked.max
				? Result.success(checked)
				: Result.failure(
						invalid(field, `min ${checked.min} exceeds max ${checked.max}`),
					),
		),
	);

const requireSeed = (
	seed: number | undefined,
): Result.Result<number | undefined, InvalidConfig> =>
	seed === undefined ? Result.success(undefined) : requireIntegerWithin("seed", seed, INT32);

/**
 * Resolves requested names against the known list, keeping request order.
 *
 * @invariant result ⊆ known ∧ result has no duplicates
 */
const selectNames = <N extends string>(
	field: string,
	requested: readonly string[] | undefined,
	known: readonly N[],
): Result.Result<readonly N[], InvalidConfig> => {
	if (requested === undefined) return Result.success(known);
	if (requested.length === 0) {
		return Result.failure(invalid(field, "at least one name is required"));
	}
	const selected: N[] = [];
	for (const name of requested) {
		const resolved = known.find((candidate) => candidate === name);
		if (resolved === undefined) {
			return Result.failure(
				invalid(field, `unknown name "${name}" (known: ${known.join(", ")})`),
			);
		}
		if (!selected.includes(resolved)) selected.push(resolved);
	}
	return Result.success(selected);
};

/**
 * Validates a configuration fragment against the defaults.
 *
 * @param input - merged configuration layers
 * @returns Success with a complete HarnessConfig, or the first InvalidConfig
 *
 * @pure true
 * @complexity O(s + l)
 *
 * @example
 * ```ts
 * validateHarnessConfig({ trials: 0 })
 * // Failure(InvalidConfig { field: "trials", ... })
 * ```
 */
export const validateHarnessConfig = (
	input: HarnessConfigInput,
): Result.Result<HarnessConfig, InvalidConfig> => {
	const defaults = DEFAULT_HARNESS_CONFIG;
	return pipe(
		requireIntegerWithin("trials", input.trials ?? defaults.trials, {
			min: 1,
			max: INT32.max,
		}),
		Result.flatMap((trials) =>
			Result.map(
				requireRange(
					"integerRange",
					{
						min: input.minInt ?? defaults.integerRange.min,
						max: input.maxInt ?? defaults.integerRange.max,
					},
					INT32,
				),
				(integerRange) => ({ trials, integerRange }),
			),
		),
		Result.flatMap((partial) =>
			Result.map(
				requireRange(
					"lengthRange",
					{
						min: input.minLength ?? defaults.lengthRange.min,
						max: input.maxLength ?? defaults.lengthRange.max,
					},
					{ min: 0, max: MAX_SEQUENCE_LENGTH },
				),
				(lengthRange) => ({ ...partial, lengthRange }),
			),
		),
		Result.flatMap((partial) =>
			Result.map(requireSeed(input.seed), (seed) => ({ ...partial, seed })),
		),
		Result.flatMap((partial) =>
			Result.map(
				selectNames<SubjectName>("subjects", input.subjects, SUBJECT_NAMES),
				(subjects) => ({ ...partial, subjects }),
			),
		),
		Result.flatMap((partial) =>
			Result.map(
				selectNames<LawName>("laws", input.laws, LAW_NAMES),
				(laws): HarnessConfig => ({
					...partial,
					laws,
					shrink: input.shrink ?? defaults.shrink,
				}),
			),
		),
	);
};
