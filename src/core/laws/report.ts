// CHANGE: Law report ADT and deterministic aggregation of check results
// PURITY: CORE
// FORMAT THEOREM: aggregate(rs) = AllPassed(Σ trials) ⇔ ∀r ∈ rs: r.report = AllPassed
// INVARIANT: The chosen counterexample has the lowest trial index; ties resolve to the earliest check
// COMPLEXITY: O(n) where n = |results|

/**
 * Every trial of a check (or of all checks) held.
 */
export interface AllPassed {
	readonly _tag: "AllPassed";
	readonly trialCount: number;
}

/**
 * A law was falsified; both sides are rendered by the subject.
 *
 * @invariant trialIndex ≥ 0 (zero-based index of the failing trial)
 */
export interface CounterexampleFound {
	readonly _tag: "CounterexampleFound";
	readonly subject: string;
	readonly law: string;
	readonly input: string;
	readonly left: string;
	readonly right: string;
	readonly trialIndex: number;
	readonly seed: number;
	readonly shrinks: number;
}

export type LawReport = AllPassed | CounterexampleFound;

/** Outcome of one (subject, law) check. */
export interface CheckResult {
	readonly subject: string;
	readonly law: string;
	readonly report: LawReport;
}

export const allPassed = (trialCount: number): AllPassed => ({
	_tag: "AllPassed",
	trialCount,
});

/**
 * Reduces per-check reports to a single verdict.
 *
 * @param results - check results in suite order
 * @returns AllPassed with the summed trial count, or the first-seen counterexample
 *
 * @pure true
 * @complexity O(n)
 */
export const aggregateReports = (
	results: readonly CheckResult[],
): LawReport => {
	let trialCount = 0;
	let earliest: CounterexampleFound | undefined;
	for (const { report } of results) {
		if (report._tag === "AllPassed") {
			trialCount += report.trialCount;
		} else if (earliest === undefined || report.trialIndex < earliest.trialIndex) {
			earliest = report;
		}
	}
	return earliest ?? allPassed(trialCount);
};
