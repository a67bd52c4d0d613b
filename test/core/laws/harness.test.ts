// CHANGE: Specs for the law verification harness and its state machine
// PURITY: CORE (seeded fast-check runs)
// INVARIANT: Lawful subjects report AllPassed; a broken subject yields a counterexample
// INVARIANT: Reported is terminal; failures inside run() reset the harness to Configured

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { DEFAULT_HARNESS_CONFIG } from "../../../src/core/config.js";
import { HarnessAborted } from "../../../src/core/errors.js";
import {
	buildSuite,
	checksFor,
	type LawCheck,
	LawVerificationHarness,
	verifyLaw,
} from "../../../src/core/laws/harness.js";
import {
	functorIdentity,
	type Law,
	LAWS,
	monadRightIdentity,
} from "../../../src/core/laws/laws.js";
import { allPassed } from "../../../src/core/laws/report.js";
import {
	type LawSubject,
	optionalSubject,
	resultSubject,
} from "../../../src/core/laws/subjects.js";
import { type HarnessConfig, SUBJECT_NAMES } from "../../../src/core/models.js";
import * as Optional from "../../../src/core/optional.js";

const seeded: HarnessConfig = { ...DEFAULT_HARNESS_CONFIG, seed: 42 };

const forgetfulOptional: LawSubject<Optional.Optional<number>> = {
	...optionalSubject,
	name: "forgetful-optional",
	map: () => Optional.absent(),
};

describe("verifyLaw", () => {
	it.each(SUBJECT_NAMES)("every law holds for the %s subject", (name) => {
		for (const check of buildSuite({ ...seeded, subjects: [name] })) {
			expect(check.verify(seeded)).toEqual(allPassed(100));
		}
	});

	it("checks a single law against a single subject", () => {
		expect(verifyLaw(resultSubject, LAWS["monad-associativity"], seeded)).toEqual(
			allPassed(100),
		);
	});

	it("reports the first failing trial of a broken map", () => {
		const report = verifyLaw(forgetfulOptional, functorIdentity, seeded);
		expect(report._tag).toBe("CounterexampleFound");
		if (report._tag !== "CounterexampleFound") return;
		expect(report.subject).toBe("forgetful-optional");
		expect(report.law).toBe("functor-identity");
		expect(report.input).toMatch(/^x = Present\(-?\d+\)$/u);
		expect(report.left).toBe("Absent");
		expect(report.right).toBe(report.input.slice("x = ".length));
		expect(report.seed).toBe(42);
		expect(report.shrinks).toBe(0);
		expect(report.trialIndex).toBeGreaterThanOrEqual(0);
		expect(report.trialIndex).toBeLessThan(100);
	});

	it("shrinks the counterexample when shrinking is enabled", () => {
		const report = verifyLaw(forgetfulOptional, functorIdentity, {
			...seeded,
			shrink: true,
		});
		expect(report._tag).toBe("CounterexampleFound");
		if (report._tag !== "CounterexampleFound") return;
		expect(report.input).toBe("x = Present(0)");
		expect(report.right).toBe("Present(0)");
	});

	it("is reproducible for a fixed seed", () => {
		const first = verifyLaw(forgetfulOptional, functorIdentity, seeded);
		const second = verifyLaw(forgetfulOptional, functorIdentity, seeded);
		expect(second).toEqual(first);
	});

	it("re-raises an exception thrown by a transform", () => {
		const exploding: LawSubject<Optional.Optional<number>> = {
			...optionalSubject,
			name: "exploding",
			flatMap: () => {
				throw new Error("kaboom");
			},
		};
		expect(() => verifyLaw(exploding, monadRightIdentity, seeded)).toThrow("kaboom");
	});

	it("aborts when the runner stops without a counterexample", () => {
		const never = (): boolean => false;
		const unsatisfiable: Law = {
			name: "functor-identity",
			cases: (subject, config) =>
				subject.values(config).map((x) => ({
					input: "x",
					evaluate: () => {
						fc.pre(never());
						return { left: x, right: x };
					},
				})),
		};
		expect(() => verifyLaw(optionalSubject, unsatisfiable, seeded)).toThrow(
			HarnessAborted,
		);
	});
});

describe("buildSuite", () => {
	it("orders checks subjects-outer, laws-inner", () => {
		const suite = buildSuite({
			...seeded,
			subjects: ["result", "sequence"],
			laws: ["monad-associativity", "functor-identity"],
		});
		expect(suite.map((check) => `${check.subject}/${check.law}`)).toEqual([
			"result/monad-associativity",
			"result/functor-identity",
			"sequence/monad-associativity",
			"sequence/functor-identity",
		]);
	});

	it("covers every subject and law by default", () => {
		expect(buildSuite(DEFAULT_HARNESS_CONFIG)).toHaveLength(15);
	});
});

describe("LawVerificationHarness", () => {
	it("passes all fifteen checks for the lawful subjects", () => {
		const harness = new LawVerificationHarness(seeded);
		expect(harness.state._tag).toBe("Configured");
		expect(harness.checks()).toEqual([]);

		expect(harness.run()).toEqual(allPassed(1500));
		expect(harness.state._tag).toBe("Reported");
		expect(harness.checks()).toHaveLength(15);
		expect(harness.checks().every((c) => c.report._tag === "AllPassed")).toBe(true);
	});

	it("returns the stored verdict on a second run", () => {
		let calls = 0;
		const counting: LawCheck = {
			subject: "sequence",
			law: "functor-identity",
			verify: () => {
				calls += 1;
				return allPassed(3);
			},
		};
		const harness = new LawVerificationHarness(seeded, [counting]);
		expect(harness.run()).toEqual(allPassed(3));
		expect(harness.run()).toEqual(allPassed(3));
		expect(calls).toBe(1);
	});

	it("reports the counterexample of a broken subject", () => {
		const harness = new LawVerificationHarness(
			seeded,
			checksFor(forgetfulOptional, ["functor-identity"]),
		);
		const verdict = harness.run();
		expect(verdict._tag).toBe("CounterexampleFound");
		expect(harness.checks()[0]?.report).toEqual(verdict);
	});

	it("rejects a re-entrant run and returns to Configured", () => {
		const holder: { harness?: LawVerificationHarness } = {};
		const reentrant: LawCheck = {
			subject: "sequence",
			law: "functor-identity",
			verify: () => holder.harness?.run() ?? allPassed(0),
		};
		const harness = new LawVerificationHarness(seeded, [reentrant]);
		holder.harness = harness;

		expect(() => harness.run()).toThrow(HarnessAborted);
		expect(harness.state._tag).toBe("Configured");
	});

	it("exposes the running state while checks execute", () => {
		const observed: string[] = [];
		const holder: { harness?: LawVerificationHarness } = {};
		const observing: LawCheck = {
			subject: "sequence",
			law: "functor-identity",
			verify: () => {
				observed.push(holder.harness?.state._tag ?? "none");
				return allPassed(1);
			},
		};
		const harness = new LawVerificationHarness(seeded, [observing, observing]);
		holder.harness = harness;
		harness.run();
		expect(observed).toEqual(["Running", "Running"]);
	});
});
