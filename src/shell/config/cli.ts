// CHANGE: CLI argument parsing into a typed command
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Every rejected argument yields InvalidConfig naming the flag; nothing is silently ignored
// COMPLEXITY: O(n) where n = |args|

import type { HarnessConfigInput } from "../../core/config.js";
import { InvalidConfig } from "../../core/errors.js";
import * as Result from "../../core/result.js";

/**
 * What the executable was asked to do.
 */
export type CLICommand =
	| {
			readonly _tag: "Laws";
			readonly configPath: string | undefined;
			readonly overrides: HarnessConfigInput;
	  }
	| { readonly _tag: "Demo"; readonly file: string };

interface ParseState {
	readonly overrides: HarnessConfigInput;
	readonly configPath: string | undefined;
	readonly positionals: readonly string[];
}

interface ParseStep {
	readonly state: ParseState;
	readonly consumedValue: boolean;
}

type ValueSetter<V> = (input: HarnessConfigInput, value: V) => HarnessConfigInput;

const numericFlags: ReadonlyMap<string, ValueSetter<number>> = new Map<
	string,
	ValueSetter<number>
>([
	["--trials", (input, trials) => ({ ...input, trials })],
	["--seed", (input, seed) => ({ ...input, seed })],
	["--min-int", (input, minInt) => ({ ...input, minInt })],
	["--max-int", (input, maxInt) => ({ ...input, maxInt })],
	["--min-length", (input, minLength) => ({ ...input, minLength })],
	["--max-length", (input, maxLength) => ({ ...input, maxLength })],
]);

const listFlags: ReadonlyMap<string, ValueSetter<string>> = new Map<
	string,
	ValueSetter<string>
>([
	[
		"--subject",
		(input, subject) => ({ ...input, subjects: [...(input.subjects ?? []), subject] }),
	],
	["--law", (input, law) => ({ ...input, laws: [...(input.laws ?? []), law] })],
]);

const INTEGER_PATTERN = /^-?\d+$/u;

const requireValue = (
	flag: string,
	value: string | undefined,
): Result.Result<string, InvalidConfig> =>
	value === undefined || value.startsWith("--")
		? Result.failure(new InvalidConfig({ field: flag, detail: "missing value" }))
		: Result.success(value);

const parseInteger = (
	flag: string,
	value: string,
): Result.Result<number, InvalidConfig> =>
	INTEGER_PATTERN.test(value)
		? Result.success(Number(value))
		: Result.failure(
				new InvalidConfig({
					field: flag,
					detail: `expected an integer, got "${value}"`,
				}),
			);

const withValue = (
	state: ParseState,
	update: (value: string) => Result.Result<ParseState, InvalidConfig>,
	flag: string,
	next: string | undefined,
): Result.Result<ParseStep, InvalidConfig> =>
	Result.map(Result.flatMap(requireValue(flag, next), update), (updated) => ({
		state: updated,
		consumedValue: true,
	}));

function processArgument(
	arg: string,
	next: string | undefined,
	state: ParseState,
): Result.Result<ParseStep, InvalidConfig> {
	const numeric = numericFlags.get(arg);
	if (numeric !== undefined) {
		return withValue(
			state,
			(raw) =>
				Result.map(parseInteger(arg, raw), (value) => ({
					...state,
					overrides: numeric(state.overrides, value),
				})),
			arg,
			next,
		);
	}
	const list = listFlags.get(arg);
	if (list !== undefined) {
		return withValue(
			state,
			(value) => Result.success({ ...state, overrides: list(state.overrides, value) }),
			arg,
			next,
		);
	}
	if (arg === "--config") {
		return withValue(
			state,
			(configPath) => Result.success({ ...state, configPath }),
			arg,
			next,
		);
	}
	if (arg === "--shrink") {
		return Result.success({
			state: { ...state, overrides: { ...state.overrides, shrink: true } },
			consumedValue: false,
		});
	}
	if (arg.startsWith("--")) {
		return Result.failure(new InvalidConfig({ field: arg, detail: "unknown flag" }));
	}
	return Result.success({
		state: { ...state, positionals: [...state.positionals, arg] },
		consumedValue: false,
	});
}

/**
 * @invariant demo accepts no harness flags: the first one given is rejected
 */
function toCommand(
	state: ParseState,
	flags: readonly string[],
): Result.Result<CLICommand, InvalidConfig> {
	const [command, file, ...rest] = state.positionals;
	if (command === undefined) {
		return Result.success({
			_tag: "Laws",
			configPath: state.configPath,
			overrides: state.overrides,
		});
	}
	if (command !== "demo") {
		return Result.failure(
			new InvalidConfig({ field: command, detail: "unexpected argument" }),
		);
	}
	if (file === undefined) {
		return Result.failure(
			new InvalidConfig({ field: "demo", detail: "missing file argument" }),
		);
	}
	const flag = flags[0];
	if (flag !== undefined) {
		return Result.failure(new InvalidConfig({ field: flag, detail: "not valid with demo" }));
	}
	const extra = rest[0];
	return extra === undefined
		? Result.success({ _tag: "Demo", file })
		: Result.failure(new InvalidConfig({ field: extra, detail: "unexpected argument" }));
}

/**
 * Parses command-line arguments.
 *
 * @example
 * ```ts
 * // Command: lawful-sums --trials 500 --subject optional --shrink
 * parseCLIArgs();
 * // Success({ _tag: "Laws", configPath: undefined,
 * //           overrides: { trials: 500, subjects: ["optional"], shrink: true } })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Result.Result<CLICommand, InvalidConfig> {
	let state: ParseState = {
		overrides: {},
		configPath: undefined,
		positionals: [],
	};
	const flags: string[] = [];

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const step = processArgument(arg, args.at(i + 1), state);
		if (Result.isFailure(step)) return step;
		state = step.value.state;
		if (arg.startsWith("--")) flags.push(arg);
		if (step.value.consumedValue) {
			i++;
		}
	}

	return toCommand(state, flags);
}
