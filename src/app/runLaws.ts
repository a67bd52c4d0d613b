// CHANGE: APP orchestration of a law-verification run
// PURITY: APP (composes CORE harness with SHELL config loading and printing)
// EFFECT: Effect<ExitCode>
// INVARIANT: Returns ExitCode as value; no termination side effects
// COMPLEXITY: O(|suite| · N)

import { Effect } from "effect";

import type { HarnessConfigInput } from "../core/config.js";
import { computeExitCode } from "../core/decision.js";
import { HarnessAborted } from "../core/errors.js";
import {
	buildSuite,
	type LawCheck,
	LawVerificationHarness,
} from "../core/laws/harness.js";
import { EXIT_FAILURE, type ExitCode, type HarnessConfig } from "../core/models.js";
import * as Result from "../core/result.js";
import { resolveHarnessConfig } from "../shell/config/index.js";
import { printAppError, printLawResults } from "../shell/output/printer.js";

/**
 * Resolves configuration, runs the harness and prints the outcome.
 *
 * @pure false (filesystem, console)
 * @effect Effect<ExitCode>
 * @param suiteFor - checks to run for the resolved configuration
 * @invariant exit code 0 ⇔ every selected law held
 */
export function runLaws(
	configPath: string | undefined,
	overrides: HarnessConfigInput,
	suiteFor: (config: HarnessConfig) => readonly LawCheck[] = buildSuite,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const resolved = resolveHarnessConfig(configPath, overrides);
		if (Result.isFailure(resolved)) {
			yield* printAppError(resolved.error);
			return EXIT_FAILURE;
		}
		const harness = new LawVerificationHarness(
			resolved.value,
			suiteFor(resolved.value),
		);
		const verdict = yield* Effect.try({
			try: () => harness.run(),
			catch: (cause) => cause,
		});
		yield* printLawResults(harness.checks(), verdict);
		return computeExitCode(verdict);
	}).pipe(
		// transform failures are defects; only an aborted run is reported
		Effect.catchAll((cause) =>
			cause instanceof HarnessAborted
				? Effect.as(printAppError(cause), EXIT_FAILURE)
				: Effect.die(cause),
		),
	);
}
