// CHANGE: Console output of harness and demo results
// PURITY: SHELL (console I/O wrapped in Effect)
// INVARIANT: Text comes from CORE formatters; this module only writes it
// COMPLEXITY: O(n) where n = number of lines

import { Effect } from "effect";

import type { AppError } from "../../core/errors.js";
import { formatAppError } from "../../core/format/errors.js";
import { formatCheck, formatVerdict } from "../../core/format/report.js";
import type { CheckResult, LawReport } from "../../core/laws/report.js";

/**
 * Prints every check result followed by the verdict.
 *
 * @pure false (console output)
 * @effect Effect<void>
 */
export function printLawResults(
	checks: readonly CheckResult[],
	verdict: LawReport,
): Effect.Effect<void> {
	return Effect.sync(() => {
		for (const check of checks) {
			for (const line of formatCheck(check)) {
				console.log(line);
			}
		}
		console.log(`\n${formatVerdict(verdict)}`);
	});
}

export function printLine(line: string): Effect.Effect<void> {
	return Effect.sync(() => {
		console.log(line);
	});
}

export function printAppError(error: AppError): Effect.Effect<void> {
	return Effect.sync(() => {
		console.error(formatAppError(error));
	});
}
