// CHANGE: Pure decision function mapping the harness verdict to an exit code
// PURITY: CORE
// FORMAT THEOREM: ∀r ∈ LawReport: computeExitCode(r) = 0 ⇔ r._tag = "AllPassed"
// INVARIANT: No side effects, deterministic mapping LawReport → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { LawReport } from "./laws/report.js";
import type { ExitCode } from "./models.js";

/**
 * Computes process exit code from the harness verdict.
 *
 * @param verdict - aggregate report of a harness run
 * @returns 0 when every law held; otherwise 1
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ _tag: "AllPassed", trialCount: 100 }); // 0
 * ```
 */
export const computeExitCode = (verdict: LawReport): ExitCode =>
	pipe(
		verdict,
		(r) => r._tag === "AllPassed",
		(held): ExitCode => (held ? 0 : 1),
	);
