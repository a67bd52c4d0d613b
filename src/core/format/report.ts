// CHANGE: Pure text rendering of law reports for the shell printer
// PURITY: CORE
// INVARIANT: Output lines are deterministic functions of the report
// COMPLEXITY: O(n) where n = number of check results

import { match } from "ts-pattern";

import type { CheckResult, LawReport } from "../laws/report.js";

const checkLabel = (result: Pick<CheckResult, "subject" | "law">): string =>
	`${result.subject} / ${result.law}`;

const plural = (count: number, noun: string): string =>
	`${count} ${noun}${count === 1 ? "" : "s"}`;

/**
 * Lines describing one check result.
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * formatCheck({ subject: "optional", law: "functor-identity", report: allPassed(100) })
 * // ["✓ optional / functor-identity: 100 trials"]
 * ```
 */
export const formatCheck = (result: CheckResult): readonly string[] =>
	match<LawReport, readonly string[]>(result.report)
		.with({ _tag: "AllPassed" }, ({ trialCount }) => [
			`✓ ${checkLabel(result)}: ${plural(trialCount, "trial")}`,
		])
		.with({ _tag: "CounterexampleFound" }, (found) => [
			`✗ ${checkLabel(result)}: counterexample at trial ${found.trialIndex} (seed ${found.seed}, ${plural(found.shrinks, "shrink")})`,
			`    input: ${found.input}`,
			`    left:  ${found.left}`,
			`    right: ${found.right}`,
		])
		.exhaustive();

/**
 * Single-line verdict for the whole run.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatVerdict = (verdict: LawReport): string =>
	match(verdict)
		.with(
			{ _tag: "AllPassed" },
			({ trialCount }) => `All laws held (${plural(trialCount, "trial")})`,
		)
		.with(
			{ _tag: "CounterexampleFound" },
			(found) => `Law violated: ${checkLabel(found)} with ${found.input}`,
		)
		.exhaustive();
