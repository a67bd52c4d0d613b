// CHANGE: Functional Core domain models for the law harness (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the CLI process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

export const SUBJECT_NAMES = ["sequence", "optional", "result"] as const;

/** Container a law is checked against. */
export type SubjectName = (typeof SUBJECT_NAMES)[number];

export const LAW_NAMES = [
	"functor-identity",
	"functor-composition",
	"monad-left-identity",
	"monad-right-identity",
	"monad-associativity",
] as const;

export type LawName = (typeof LAW_NAMES)[number];

/**
 * Closed integer interval.
 *
 * @invariant min ≤ max
 */
export interface IntRange {
	readonly min: number;
	readonly max: number;
}

/**
 * Validated harness configuration.
 *
 * @remarks
 * - @invariant trials ≥ 1
 * - @invariant integerRange.min ≤ integerRange.max
 * - @invariant 0 ≤ lengthRange.min ≤ lengthRange.max
 * - @invariant subjects and laws are non-empty and duplicate-free
 */
export interface HarnessConfig {
	readonly trials: number;
	readonly integerRange: IntRange;
	readonly lengthRange: IntRange;
	readonly seed: number | undefined;
	readonly shrink: boolean;
	readonly subjects: readonly SubjectName[];
	readonly laws: readonly LawName[];
}

export const EXIT_SUCCESS: ExitCode = 0;
export const EXIT_FAILURE: ExitCode = 1;
