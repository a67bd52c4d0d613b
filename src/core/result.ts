// CHANGE: Result sum type with success/error channel combinators
// PURITY: CORE (fromCatching runs the caller's operation once)
// FORMAT THEOREM: ∀e, f: map(failure(e), f) = failure(e) ∧ mapError(failure(e), f) = failure(f(e))
// INVARIANT: Exactly one of Success | Failure; only fromCatching converts a throw into Failure
// COMPLEXITY: O(1) per combinator (excluding the supplied function)

import { Equivalence } from "effect";
import { dual } from "effect/Function";

import { absent, type Optional, present } from "./optional.js";

export interface Success<A> {
	readonly _tag: "Success";
	readonly value: A;
}

export interface Failure<E> {
	readonly _tag: "Failure";
	readonly error: E;
}

/**
 * Outcome of an attempted operation.
 *
 * @typeParam A - success payload
 * @typeParam E - failure payload; never inspected by the combinators
 * @invariant exactly one variant is active
 */
export type Result<A, E> = Success<A> | Failure<E>;

/**
 * Lifts a bare value into Success.
 *
 * @pure true
 * @complexity O(1)
 */
export const success = <A, E = never>(value: A): Result<A, E> => ({
	_tag: "Success",
	value,
});

/**
 * Wraps an error payload into Failure.
 *
 * @pure true
 * @complexity O(1)
 */
export const failure = <E, A = never>(error: E): Result<A, E> => ({
	_tag: "Failure",
	error,
});

export const isSuccess = <A, E>(self: Result<A, E>): self is Success<A> =>
	self._tag === "Success";

export const isFailure = <A, E>(self: Result<A, E>): self is Failure<E> =>
	self._tag === "Failure";

/**
 * Transforms the success payload; Failure passes through untouched.
 *
 * @pure true (when `f` is)
 * @postcondition an exception thrown by `f` reaches the caller unchanged
 * @complexity O(1)
 */
export const map: {
	<A, B>(f: (a: A) => B): <E>(self: Result<A, E>) => Result<B, E>;
	<A, E, B>(self: Result<A, E>, f: (a: A) => B): Result<B, E>;
} = dual(
	2,
	<A, E, B>(self: Result<A, E>, f: (a: A) => B): Result<B, E> =>
		isSuccess(self) ? success(f(self.value)) : self,
);

/**
 * Transforms the failure payload; Success passes through untouched.
 *
 * @pure true (when `f` is)
 * @invariant mapError(success(a), f) = success(a)
 * @complexity O(1)
 */
export const mapError: {
	<E, F>(f: (e: E) => F): <A>(self: Result<A, E>) => Result<A, F>;
	<A, E, F>(self: Result<A, E>, f: (e: E) => F): Result<A, F>;
} = dual(
	2,
	<A, E, F>(self: Result<A, E>, f: (e: E) => F): Result<A, F> =>
		isFailure(self) ? failure(f(self.error)) : self,
);

/**
 * Chains a computation that may fail with the same error type.
 *
 * @pure true (when `f` is)
 * @invariant flatMap(success(a), f) = f(a) without re-wrapping
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const positive = (x: number) => (x > 0 ? success(x * 2) : failure("neg"));
 * flatMap(success(5), positive)  // Success(10)
 * flatMap(success(-1), positive) // Failure("neg")
 * ```
 */
export const flatMap: {
	<A, B, E>(f: (a: A) => Result<B, E>): (self: Result<A, E>) => Result<B, E>;
	<A, E, B>(self: Result<A, E>, f: (a: A) => Result<B, E>): Result<B, E>;
} = dual(
	2,
	<A, E, B>(self: Result<A, E>, f: (a: A) => Result<B, E>): Result<B, E> =>
		isSuccess(self) ? f(self.value) : self,
);

/**
 * Runs `operation` exactly once and captures its outcome.
 *
 * A normal return becomes Success; whatever it throws becomes Failure,
 * optionally translated by `onThrow`. No retry, no timeout: a blocking
 * operation blocks here.
 *
 * @pure false (performs whatever `operation` performs)
 * @postcondition operation is invoked exactly once, synchronously
 * @complexity O(1) plus the cost of `operation`
 *
 * @example
 * ```ts
 * fromCatching(() => JSON.parse("{"), (cause) => new DecodeError({ detail: String(cause) }))
 * // Failure(DecodeError)
 * ```
 */
export function fromCatching<A>(operation: () => A): Result<A, unknown>;
export function fromCatching<A, E>(
	operation: () => A,
	onThrow: (cause: unknown) => E,
): Result<A, E>;
export function fromCatching<A, E>(
	operation: () => A,
	onThrow?: (cause: unknown) => E,
): Result<A, unknown> {
	let value: A;
	try {
		value = operation();
	} catch (cause) {
		return failure(onThrow === undefined ? cause : onThrow(cause));
	}
	return success(value);
}

/**
 * Success payload, or the fallback on Failure.
 */
export const unwrapOr: {
	<A>(fallback: A): <E>(self: Result<A, E>) => A;
	<A, E>(self: Result<A, E>, fallback: A): A;
} = dual(
	2,
	<A, E>(self: Result<A, E>, fallback: A): A =>
		isSuccess(self) ? self.value : fallback,
);

export interface ResultCases<A, E, B> {
	readonly onSuccess: (value: A) => B;
	readonly onFailure: (error: E) => B;
}

/**
 * Exhaustive elimination; the caller decides what to do with the error.
 */
export const match: {
	<A, E, B>(cases: ResultCases<A, E, B>): (self: Result<A, E>) => B;
	<A, E, B>(self: Result<A, E>, cases: ResultCases<A, E, B>): B;
} = dual(
	2,
	<A, E, B>(self: Result<A, E>, cases: ResultCases<A, E, B>): B =>
		isSuccess(self) ? cases.onSuccess(self.value) : cases.onFailure(self.error),
);

/**
 * Drops the error payload.
 *
 * @invariant toOptional(success(a)) = present(a); toOptional(failure(e)) = absent()
 */
export const toOptional = <A, E>(self: Result<A, E>): Optional<A> =>
	isSuccess(self) ? present(self.value) : absent();

/**
 * Equivalence over both channels; the error equivalence is the caller's choice.
 *
 * @complexity O(1) plus the cost of the supplied equivalences
 */
export const getEquivalence = <A, E>(equivalences: {
	readonly success: Equivalence.Equivalence<A>;
	readonly failure: Equivalence.Equivalence<E>;
}): Equivalence.Equivalence<Result<A, E>> =>
	Equivalence.make<Result<A, E>>((self, that) => {
		if (isSuccess(self)) {
			return isSuccess(that) && equivalences.success(self.value, that.value);
		}
		return isFailure(that) && equivalences.failure(self.error, that.error);
	});
