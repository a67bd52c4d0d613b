// CHANGE: Optional sum type with functor/monad combinators
// PURITY: CORE
// FORMAT THEOREM: ∀x: map(x, id) = x ∧ map(map(x, f), g) = map(x, g ∘ f)
// INVARIANT: Exactly one of Absent | Present; nesting is collapsed only by flatten/flatMap
// COMPLEXITY: O(1) per combinator (excluding the supplied function)

import { Equal, Equivalence } from "effect";
import { dual } from "effect/Function";

/**
 * Variant for a value that is not there.
 *
 * @invariant `_tag === "Absent"`
 */
export interface Absent {
	readonly _tag: "Absent";
}

/**
 * Variant for a value that is there.
 *
 * @invariant `_tag === "Present"`
 */
export interface Present<A> {
	readonly _tag: "Present";
	readonly value: A;
}

/**
 * Either a wrapped value or its absence.
 *
 * @typeParam A - wrapped type; may itself be an Optional
 * @invariant exactly one variant is active
 */
export type Optional<A> = Absent | Present<A>;

const ABSENT: Absent = Object.freeze({ _tag: "Absent" });

/**
 * Absent value.
 *
 * @pure true
 * @invariant absent() === absent() (shared frozen singleton)
 * @complexity O(1)
 */
export const absent = <A = never>(): Optional<A> => ABSENT;

/**
 * Lifts a bare value into Present.
 *
 * @pure true
 * @complexity O(1)
 */
export const present = <A>(value: A): Optional<A> => ({
	_tag: "Present",
	value,
});

/**
 * Present for anything but `null`/`undefined`.
 *
 * @example
 * ```ts
 * fromNullable(new Map([["a", 1]]).get("b")) // Absent
 * ```
 */
export const fromNullable = <A>(
	value: A | null | undefined,
): Optional<NonNullable<A>> =>
	value === null || value === undefined ? absent() : present(value);

export const isAbsent = <A>(self: Optional<A>): self is Absent =>
	self._tag === "Absent";

export const isPresent = <A>(self: Optional<A>): self is Present<A> =>
	self._tag === "Present";

/**
 * Transforms the wrapped value.
 *
 * @pure true (when `f` is)
 * @invariant map(absent(), f) = absent() and `f` is never called on Absent
 * @postcondition an exception thrown by `f` reaches the caller unchanged
 * @complexity O(1)
 *
 * @example
 * ```ts
 * pipe(present(5), map((x) => x * 2)) // Present(10)
 * map(absent<number>(), (x) => x * 2) // Absent
 * ```
 */
export const map: {
	<A, B>(f: (a: A) => B): (self: Optional<A>) => Optional<B>;
	<A, B>(self: Optional<A>, f: (a: A) => B): Optional<B>;
} = dual(
	2,
	<A, B>(self: Optional<A>, f: (a: A) => B): Optional<B> =>
		isPresent(self) ? present(f(self.value)) : absent(),
);

/**
 * Chains a computation that may itself be absent.
 *
 * @pure true (when `f` is)
 * @invariant flatMap(present(a), f) = f(a) without re-wrapping
 * @complexity O(1)
 */
export const flatMap: {
	<A, B>(f: (a: A) => Optional<B>): (self: Optional<A>) => Optional<B>;
	<A, B>(self: Optional<A>, f: (a: A) => Optional<B>): Optional<B>;
} = dual(
	2,
	<A, B>(self: Optional<A>, f: (a: A) => Optional<B>): Optional<B> =>
		isPresent(self) ? f(self.value) : absent(),
);

/**
 * Removes one level of nesting.
 *
 * @invariant flatten(present(present(a))) = present(a); flatten(present(absent())) = absent()
 */
export const flatten = <A>(self: Optional<Optional<A>>): Optional<A> =>
	flatMap(self, (inner) => inner);

/**
 * Wrapped value, or the fallback when absent.
 *
 * @pure true
 * @complexity O(1)
 */
export const unwrapOr: {
	<A>(fallback: A): (self: Optional<A>) => A;
	<A>(self: Optional<A>, fallback: A): A;
} = dual(
	2,
	<A>(self: Optional<A>, fallback: A): A =>
		isPresent(self) ? self.value : fallback,
);

export interface OptionalCases<A, B> {
	readonly onAbsent: () => B;
	readonly onPresent: (value: A) => B;
}

/**
 * Exhaustive elimination of both variants.
 *
 * @pure true (when both cases are)
 * @complexity O(1)
 */
export const match: {
	<A, B>(cases: OptionalCases<A, B>): (self: Optional<A>) => B;
	<A, B>(self: Optional<A>, cases: OptionalCases<A, B>): B;
} = dual(
	2,
	<A, B>(self: Optional<A>, cases: OptionalCases<A, B>): B =>
		isPresent(self) ? cases.onPresent(self.value) : cases.onAbsent(),
);

/**
 * Lifts an equivalence on values to an equivalence on Optionals.
 *
 * @invariant eq(a, b) ⇔ (a, b both Absent) ∨ (a, b both Present ∧ item(a.value, b.value))
 * @complexity O(1) plus the cost of `item`
 */
export const getEquivalence = <A>(
	item: Equivalence.Equivalence<A>,
): Equivalence.Equivalence<Optional<A>> =>
	Equivalence.make<Optional<A>>((self, that) =>
		isPresent(self)
			? isPresent(that) && item(self.value, that.value)
			: isAbsent(that),
	);

/**
 * Equality with Effect's structural `Equal.equals` on the wrapped values.
 */
export const equals = <A>(self: Optional<A>, that: Optional<A>): boolean =>
	getEquivalence<A>((x, y) => Equal.equals(x, y))(self, that);
