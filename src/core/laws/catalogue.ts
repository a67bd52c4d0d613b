// CHANGE: Fixed catalogue of named pure functions used to instantiate laws
// PURITY: CORE
// INVARIANT: Every entry is total and deterministic on safe integers; names are unique
// COMPLEXITY: O(1) per application

/**
 * A named function value, so counterexamples can say which function was drawn.
 */
export interface Named<F> {
	readonly name: string;
	readonly run: F;
}

export type IntFunction = Named<(value: number) => number>;

/** Wraps an integer into a container: the `f`, `g` of the monad laws. */
export type Kleisli<F> = Named<(value: number) => F>;

export const identityFunction: IntFunction = {
	name: "identity",
	run: (value) => value,
};

export const INT_FUNCTIONS: readonly IntFunction[] = [
	identityFunction,
	{ name: "multiplyBy2", run: (value) => value * 2 },
	{ name: "add1", run: (value) => value + 1 },
	{ name: "negate", run: (value) => 0 - value },
];

/**
 * Composition in application order: `then(first(v))`.
 *
 * @pure true
 * @complexity O(1)
 */
export const compose = (
	first: IntFunction,
	then: IntFunction,
): IntFunction => ({
	name: `${then.name} ∘ ${first.name}`,
	run: (value) => then.run(first.run(value)),
});
