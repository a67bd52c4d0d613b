// CHANGE: Functor and monad laws as generators of evaluable law cases
// PURITY: CORE
// FORMAT THEOREM: law holds for subject S ⇔ ∀c ∈ cases(S): S.equivalence(c.evaluate().left, c.evaluate().right)
// INVARIANT: Cases carry a thunk, so both sides can be recomputed for a counterexample
// COMPLEXITY: O(1) per case plus the cost of the subject's map/flatMap

import fc from "fast-check";

import type { HarnessConfig, LawName } from "../models.js";
import {
	compose,
	INT_FUNCTIONS,
	identityFunction,
	type Named,
} from "./catalogue.js";
import type { LawSubject } from "./subjects.js";

export interface LawSides<F> {
	readonly left: F;
	readonly right: F;
}

/**
 * One generated trial: a printable description of the drawn inputs plus the
 * deferred evaluation of both sides.
 */
export interface LawCase<F> {
	readonly input: string;
	readonly evaluate: () => LawSides<F>;
}

export interface Law {
	readonly name: LawName;
	readonly cases: <F>(
		subject: LawSubject<F>,
		config: HarnessConfig,
	) => fc.Arbitrary<LawCase<F>>;
}

/**
 * Two entries of the pool with different names.
 *
 * @precondition pool contains at least two distinct names
 */
const distinctPair = <T extends Named<unknown>>(
	pool: readonly T[],
): fc.Arbitrary<[T, T]> =>
	fc
		.tuple(fc.constantFrom(...pool), fc.constantFrom(...pool))
		.filter(([f, g]) => f.name !== g.name);

/** x.map(identity) == x */
export const functorIdentity: Law = {
	name: "functor-identity",
	cases: (subject, config) =>
		subject.values(config).map((x) => ({
			input: `x = ${subject.show(x)}`,
			evaluate: () => ({ left: subject.map(x, identityFunction.run), right: x }),
		})),
};

/** x.map(f).map(g) == x.map(v => g(f(v))) */
export const functorComposition: Law = {
	name: "functor-composition",
	cases: (subject, config) =>
		fc
			.tuple(subject.values(config), distinctPair(INT_FUNCTIONS))
			.map(([x, [f, g]]) => ({
				input: `x = ${subject.show(x)}, f = ${f.name}, g = ${g.name}`,
				evaluate: () => ({
					left: subject.map(subject.map(x, f.run), g.run),
					right: subject.map(x, compose(f, g).run),
				}),
			})),
};

/** wrap(a).flatMap(f) == f(a) */
export const monadLeftIdentity: Law = {
	name: "monad-left-identity",
	cases: (subject, config) =>
		fc
			.tuple(
				fc.integer({
					min: config.integerRange.min,
					max: config.integerRange.max,
				}),
				fc.constantFrom(...subject.kleisli),
			)
			.map(([a, f]) => ({
				input: `a = ${a}, f = ${f.name}`,
				evaluate: () => ({
					left: subject.flatMap(subject.wrap(a), f.run),
					right: f.run(a),
				}),
			})),
};

/** m.flatMap(wrap) == m */
export const monadRightIdentity: Law = {
	name: "monad-right-identity",
	cases: (subject, config) =>
		subject.values(config).map((m) => ({
			input: `m = ${subject.show(m)}`,
			evaluate: () => ({ left: subject.flatMap(m, subject.wrap), right: m }),
		})),
};

/** m.flatMap(f).flatMap(g) == m.flatMap(v => f(v).flatMap(g)) */
export const monadAssociativity: Law = {
	name: "monad-associativity",
	cases: (subject, config) =>
		fc
			.tuple(subject.values(config), distinctPair(subject.kleisli))
			.map(([m, [f, g]]) => ({
				input: `m = ${subject.show(m)}, f = ${f.name}, g = ${g.name}`,
				evaluate: () => ({
					left: subject.flatMap(subject.flatMap(m, f.run), g.run),
					right: subject.flatMap(m, (v) => subject.flatMap(f.run(v), g.run)),
				}),
			})),
};

export const LAWS: Readonly<Record<LawName, Law>> = {
	"functor-identity": functorIdentity,
	"functor-composition": functorComposition,
	"monad-left-identity": monadLeftIdentity,
	"monad-right-identity": monadRightIdentity,
	"monad-associativity": monadAssociativity,
};
