// CHANGE: APP orchestration of the person-decoding demo
// PURITY: APP
// EFFECT: Effect<ExitCode>
// INVARIANT: Read and decode failures are printed and mapped to exit code 1

import { Effect, pipe } from "effect";

import { decodePerson, type Person, personAge } from "../core/demo/person.js";
import type { DecodeError, ReadError } from "../core/errors.js";
import { EXIT_FAILURE, EXIT_SUCCESS, type ExitCode } from "../core/models.js";
import * as Result from "../core/result.js";
import { readSource } from "../shell/demo/source.js";
import { printAppError, printLine } from "../shell/output/printer.js";

type DemoError = ReadError | DecodeError;

/**
 * Reads `file`, decodes a person and prints the age.
 *
 * @pure false (filesystem, console)
 * @effect Effect<ExitCode>
 */
export function runDemo(file: string): Effect.Effect<ExitCode> {
	const age = pipe(
		readSource(file),
		Result.mapError((error: ReadError): DemoError => error),
		Result.flatMap((text: string): Result.Result<Person, DemoError> =>
			decodePerson(text),
		),
		personAge,
	);
	return Result.match(age, {
		onSuccess: (value) => Effect.as(printLine(`age: ${value}`), EXIT_SUCCESS),
		onFailure: (error) => Effect.as(printAppError(error), EXIT_FAILURE),
	});
}
