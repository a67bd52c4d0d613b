// CHANGE: Typed domain error ADT built on Effect.Data
// PURITY: CORE
// INVARIANT: Errors are values discriminated by `_tag`; they travel in Result/Effect channels
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Harness configuration rejected during validation or loading.
 *
 * @invariant field.length > 0 ∧ detail.length > 0
 */
export class InvalidConfig extends Data.TaggedError("InvalidConfig")<{
	readonly field: string;
	readonly detail: string;
}> {}

/**
 * Property runner stopped without producing a counterexample.
 *
 * @invariant detail.length > 0
 */
export class HarnessAborted extends Data.TaggedError("HarnessAborted")<{
	readonly subject: string;
	readonly law: string;
	readonly detail: string;
}> {}

/**
 * Integer division by zero, thrown by the demo arithmetic.
 */
export class DivisionByZero extends Data.TaggedError("DivisionByZero")<{
	readonly dividend: number;
}> {}

/**
 * Text could not be decoded into the expected record.
 */
export class DecodeError extends Data.TaggedError("DecodeError")<{
	readonly detail: string;
}> {}

/**
 * Source could not be read.
 *
 * @invariant path.length > 0
 */
export class ReadError extends Data.TaggedError("ReadError")<{
	readonly path: string;
	readonly detail: string;
}> {}

export type AppError =
	| InvalidConfig
	| HarnessAborted
	| DivisionByZero
	| DecodeError
	| ReadError;

/**
 * Human-readable description of a thrown value.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeCause = (cause: unknown): string =>
	cause instanceof Error ? cause.message : String(cause);
