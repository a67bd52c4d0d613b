// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or the harness class
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// SUM TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Optional and Result combinators, namespaced so `map`/`flatMap` do not clash.
 *
 * @example
 * ```typescript
 * import { pipe } from "effect";
 * import { Optional, Result } from "lawful-sums";
 *
 * pipe(Optional.present(5), Optional.map((x) => x * 2)); // Present(10)
 * Result.fromCatching(() => JSON.parse("{")); // Failure(SyntaxError)
 * ```
 */
export * as Optional from "./core/optional.js";
export * as Result from "./core/result.js";

// ═══════════════════════════════════════════════════════════════════════════════
// LAW VERIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

export {
	buildSuite,
	checksFor,
	type HarnessState,
	type LawCheck,
	LawVerificationHarness,
	verifyLaw,
} from "./core/laws/harness.js";
export {
	type Law,
	type LawCase,
	LAWS,
	type LawSides,
} from "./core/laws/laws.js";
export {
	aggregateReports,
	type AllPassed,
	type CheckResult,
	type CounterexampleFound,
	type LawReport,
} from "./core/laws/report.js";
export {
	type IntResult,
	type LawSubject,
	optionalSubject,
	resultSubject,
	type Sequence,
	sequenceSubject,
} from "./core/laws/subjects.js";
export {
	compose,
	INT_FUNCTIONS,
	type IntFunction,
	type Kleisli,
	type Named,
} from "./core/laws/catalogue.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION, ERRORS, OUTPUT
// ═══════════════════════════════════════════════════════════════════════════════

export {
	DEFAULT_HARNESS_CONFIG,
	type HarnessConfigInput,
	MAX_SEQUENCE_LENGTH,
	mergeConfigInputs,
	validateHarnessConfig,
} from "./core/config.js";
export {
	type ExitCode,
	type HarnessConfig,
	type IntRange,
	LAW_NAMES,
	type LawName,
	SUBJECT_NAMES,
	type SubjectName,
} from "./core/models.js";
export {
	type AppError,
	DecodeError,
	DivisionByZero,
	HarnessAborted,
	InvalidConfig,
	ReadError,
} from "./core/errors.js";
export { computeExitCode } from "./core/decision.js";
export { formatCheck, formatVerdict } from "./core/format/report.js";
export { formatAppError } from "./core/format/errors.js";
