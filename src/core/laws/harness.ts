// CHANGE: Property-based law verification harness (Configured → Running → Reported)
// PURITY: CORE (randomness is seeded through fast-check; no I/O)
// FORMAT THEOREM: run() = AllPassed(n) ⇔ ∀ check ∈ suite, ∀ trial ≤ N: left ≡ right
// INVARIANT: Reported is terminal; a second run() returns the stored verdict
// COMPLEXITY: O(|suite| · N · c) where c = cost of one law evaluation

import fc from "fast-check";
import { match } from "ts-pattern";

import { HarnessAborted } from "../errors.js";
import type { HarnessConfig, LawName, SubjectName } from "../models.js";
import { type Law, type LawCase, LAWS } from "./laws.js";
import {
	aggregateReports,
	allPassed,
	type CheckResult,
	type LawReport,
} from "./report.js";
import {
	type LawSubject,
	optionalSubject,
	resultSubject,
	sequenceSubject,
} from "./subjects.js";

/**
 * One (subject, law) pair, with the subject's container type hidden in the closure.
 */
export interface LawCheck {
	readonly subject: string;
	readonly law: LawName;
	readonly verify: (config: HarnessConfig) => LawReport;
}

export type HarnessState =
	| { readonly _tag: "Configured"; readonly config: HarnessConfig }
	| {
			readonly _tag: "Running";
			readonly config: HarnessConfig;
			readonly completed: readonly CheckResult[];
	  }
	| {
			readonly _tag: "Reported";
			readonly config: HarnessConfig;
			readonly checks: readonly CheckResult[];
			readonly verdict: LawReport;
	  };

const runParameters = <Ts>(config: HarnessConfig): fc.Parameters<Ts> => ({
	numRuns: config.trials,
	endOnFailure: !config.shrink,
	...(config.seed === undefined ? {} : { seed: config.seed }),
});

/**
 * Runs one law against one subject for `config.trials` trials.
 *
 * @returns AllPassed(N), or the first failing case with both sides rendered
 * @throws HarnessAborted when fast-check stops without a counterexample
 * @throws whatever a transform threw, re-raised by re-evaluating the failing case
 *
 * @pure true for a fixed seed
 * @complexity O(N · c)
 */
export const verifyLaw = <F>(
	subject: LawSubject<F>,
	law: Law,
	config: HarnessConfig,
): LawReport => {
	const property = fc.property(law.cases(subject, config), (trial) => {
		const sides = trial.evaluate();
		return subject.equivalence(sides.left, sides.right);
	});
	const details = fc.check(property, runParameters<[LawCase<F>]>(config));
	if (!details.failed) return allPassed(details.numRuns);
	if (details.counterexample === null) {
		throw new HarnessAborted({
			subject: subject.name,
			law: law.name,
			detail: `stopped after ${details.numRuns} trials without a counterexample`,
		});
	}
	const [failing] = details.counterexample;
	const sides = failing.evaluate();
	return {
		_tag: "CounterexampleFound",
		subject: subject.name,
		law: law.name,
		input: failing.input,
		left: subject.show(sides.left),
		right: subject.show(sides.right),
		trialIndex: details.numRuns - 1,
		seed: details.seed,
		shrinks: details.numShrinks,
	};
};

/**
 * Pairs a subject with each of the given laws.
 *
 * @pure true
 * @complexity O(|laws|)
 */
export const checksFor = <F>(
	subject: LawSubject<F>,
	laws: readonly LawName[],
): readonly LawCheck[] =>
	laws.map((name) => ({
		subject: subject.name,
		law: name,
		verify: (config: HarnessConfig) => verifyLaw(subject, LAWS[name], config),
	}));

const checksForSubject = (
	name: SubjectName,
	laws: readonly LawName[],
): readonly LawCheck[] =>
	match(name)
		.with("sequence", () => checksFor(sequenceSubject, laws))
		.with("optional", () => checksFor(optionalSubject, laws))
		.with("result", () => checksFor(resultSubject, laws))
		.exhaustive();

/**
 * Suite selected by the configuration: subjects outer, laws inner.
 */
export const buildSuite = (config: HarnessConfig): readonly LawCheck[] =>
	config.subjects.flatMap((name) => checksForSubject(name, config.laws));

/**
 * Drives a suite of law checks and keeps the outcome.
 *
 * @example
 * ```ts
 * const harness = new LawVerificationHarness(DEFAULT_HARNESS_CONFIG);
 * const verdict = harness.run(); // { _tag: "AllPassed", trialCount: 1500 }
 * ```
 */
export class LawVerificationHarness {
	private current: HarnessState;

	constructor(
		config: HarnessConfig,
		private readonly suite: readonly LawCheck[] = buildSuite(config),
	) {
		this.current = { _tag: "Configured", config };
	}

	get state(): HarnessState {
		return this.current;
	}

	run(): LawReport {
		return match<HarnessState, LawReport>(this.current)
			.with({ _tag: "Configured" }, ({ config }) => this.execute(config))
			.with({ _tag: "Running" }, () => {
				throw new HarnessAborted({
					subject: "*",
					law: "*",
					detail: "run() called while the harness is already running",
				});
			})
			.with({ _tag: "Reported" }, ({ verdict }) => verdict)
			.exhaustive();
	}

	/** Per-check results; empty until the harness has reported. */
	checks(): readonly CheckResult[] {
		return this.current._tag === "Reported" ? this.current.checks : [];
	}

	private execute(config: HarnessConfig): LawReport {
		const completed: CheckResult[] = [];
		this.current = { _tag: "Running", config, completed };
		try {
			for (const check of this.suite) {
				completed.push({
					subject: check.subject,
					law: check.law,
					report: check.verify(config),
				});
			}
		} catch (error) {
			// an aborted run may be retried from scratch
			this.current = { _tag: "Configured", config };
			throw error;
		}
		const verdict = aggregateReports(completed);
		this.current = { _tag: "Reported", config, checks: completed, verdict };
		return verdict;
	}
}
