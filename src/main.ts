// CHANGE: Thin APP delegator from CLI arguments to the selected program
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { Effect } from "effect";
import { match } from "ts-pattern";

import { runDemo } from "./app/runDemo.js";
import { runLaws } from "./app/runLaws.js";
import { EXIT_FAILURE, type ExitCode } from "./core/models.js";
import * as Result from "./core/result.js";
import { type CLICommand, parseCLIArgs } from "./shell/config/index.js";
import { printAppError } from "./shell/output/printer.js";

const runCommand = (command: CLICommand): Effect.Effect<ExitCode> =>
	match(command)
		.with({ _tag: "Laws" }, ({ configPath, overrides }) =>
			runLaws(configPath, overrides),
		)
		.with({ _tag: "Demo" }, ({ file }) => runDemo(file))
		.exhaustive();

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1)
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export async function main(
	args: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	const program = Result.match(parseCLIArgs(args), {
		onSuccess: runCommand,
		onFailure: (error) => Effect.as(printAppError(error), EXIT_FAILURE),
	});
	return Effect.runPromise(program);
}
