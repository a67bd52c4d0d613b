// CHANGE: Concrete law subjects (sequence, Optional, Result) over integer elements
// PURITY: CORE
// INVARIANT: Each subject is described monomorphically; no abstraction over container kinds
// COMPLEXITY: O(1) per operation, O(n) for sequences where n = length

import fc from "fast-check";
import { Equivalence } from "effect";

import type { HarnessConfig } from "../models.js";
import * as Optional from "../optional.js";
import * as Result from "../result.js";
import type { Kleisli } from "./catalogue.js";

/**
 * Everything a law needs to know about one container type.
 *
 * @typeParam F - the container instantiated at `number`, e.g. `Optional<number>`
 */
export interface LawSubject<F> {
	readonly name: string;
	/** Random containers bounded by the harness configuration. */
	readonly values: (config: HarnessConfig) => fc.Arbitrary<F>;
	readonly wrap: (value: number) => F;
	readonly map: (self: F, f: (value: number) => number) => F;
	readonly flatMap: (self: F, f: (value: number) => F) => F;
	/** Pool the monad laws draw `f` and `g` from. */
	readonly kleisli: readonly Kleisli<F>[];
	readonly equivalence: Equivalence.Equivalence<F>;
	readonly show: (value: F) => string;
}

export type Sequence = readonly number[];

const integers = (config: HarnessConfig): fc.Arbitrary<number> =>
	fc.integer({ min: config.integerRange.min, max: config.integerRange.max });

export const sequenceSubject: LawSubject<Sequence> = {
	name: "sequence",
	values: (config) =>
		fc.array(integers(config), {
			minLength: config.lengthRange.min,
			maxLength: config.lengthRange.max,
		}),
	wrap: (value) => [value],
	map: (self, f) => self.map((value) => f(value)),
	flatMap: (self, f) => self.flatMap((value) => f(value)),
	kleisli: [
		{ name: "duplicate", run: (value) => [value, value] },
		{ name: "withSuccessor", run: (value) => [value, value + 1] },
		{ name: "emptyIfNegative", run: (value) => (value < 0 ? [] : [value]) },
		{ name: "alwaysEmpty", run: () => [] },
	],
	equivalence: Equivalence.array(Equivalence.number),
	show: (self) => `[${self.join(", ")}]`,
};

export const optionalSubject: LawSubject<Optional.Optional<number>> = {
	name: "optional",
	values: (config) =>
		fc
			.option(integers(config))
			.map((value): Optional.Optional<number> => Optional.fromNullable(value)),
	wrap: (value) => Optional.present(value),
	map: (self, f) => Optional.map(self, f),
	flatMap: (self, f) => Optional.flatMap(self, f),
	kleisli: [
		{ name: "presentDoubled", run: (value) => Optional.present(value * 2) },
		{
			name: "halveIfEven",
			run: (value) =>
				value % 2 === 0 ? Optional.present(value / 2) : Optional.absent(),
		},
		{
			name: "absentIfNegative",
			run: (value) => (value < 0 ? Optional.absent() : Optional.present(value)),
		},
		{ name: "alwaysAbsent", run: () => Optional.absent() },
	],
	equivalence: Optional.getEquivalence(Equivalence.number),
	show: Optional.match({
		onAbsent: () => "Absent",
		onPresent: (value: number) => `Present(${value})`,
	}),
};

export type IntResult = Result.Result<number, string>;

const FAILURE_PAYLOADS = ["neg", "odd", "boom"] as const;

export const resultSubject: LawSubject<IntResult> = {
	name: "result",
	values: (config) =>
		fc.oneof(
			integers(config).map((value): IntResult => Result.success(value)),
			fc
				.constantFrom(...FAILURE_PAYLOADS)
				.map((error): IntResult => Result.failure(error)),
		),
	wrap: (value) => Result.success(value),
	map: (self, f) => Result.map(self, f),
	flatMap: (self, f) => Result.flatMap(self, f),
	kleisli: [
		{ name: "successIncremented", run: (value) => Result.success(value + 1) },
		{
			name: "failIfNegative",
			run: (value) => (value < 0 ? Result.failure("neg") : Result.success(value)),
		},
		{
			name: "failIfOdd",
			run: (value) =>
				value % 2 === 0 ? Result.success(value) : Result.failure("odd"),
		},
		{ name: "alwaysFailure", run: () => Result.failure("boom") },
	],
	equivalence: Result.getEquivalence({
		success: Equivalence.number,
		failure: Equivalence.string,
	}),
	show: Result.match({
		onSuccess: (value: number) => `Success(${value})`,
		onFailure: (error: string) => `Failure(${JSON.stringify(error)})`,
	}),
};
