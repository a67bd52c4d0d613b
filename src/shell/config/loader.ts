// CHANGE: Load harness overrides from lawful-sums.config.json
// PURITY: SHELL (filesystem)
// INVARIANT: Missing default file → no overrides; unreadable or malformed file → InvalidConfig
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";
import * as path from "node:path";

import type { HarnessConfigInput } from "../../core/config.js";
import { describeCause, InvalidConfig } from "../../core/errors.js";
import * as Result from "../../core/result.js";

export const CONFIG_FILE_NAME = "lawful-sums.config.json";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: JSONValue): value is readonly string[] {
	return Array.isArray(value) && value.every((item) => typeof item === "string");
}

const invalidField = (field: string, detail: string): InvalidConfig =>
	new InvalidConfig({ field: `${CONFIG_FILE_NAME}:${field}`, detail });

const NUMERIC_KEYS = [
	"trials",
	"minInt",
	"maxInt",
	"minLength",
	"maxLength",
	"seed",
] as const;

type NumericKey = (typeof NUMERIC_KEYS)[number];

function readNumber(
	object: JSONObject,
	key: NumericKey,
): Result.Result<number | undefined, InvalidConfig> {
	const value = object[key];
	if (value === undefined) return Result.success(undefined);
	return typeof value === "number"
		? Result.success(value)
		: Result.failure(invalidField(key, "expected a number"));
}

function readNames(
	object: JSONObject,
	key: "subjects" | "laws",
): Result.Result<readonly string[] | undefined, InvalidConfig> {
	const value = object[key];
	if (value === undefined) return Result.success(undefined);
	return isStringArray(value)
		? Result.success(value)
		: Result.failure(invalidField(key, "expected an array of strings"));
}

/**
 * Narrows parsed JSON into a configuration fragment.
 *
 * @pure true
 * @invariant unknown keys are ignored; known keys of the wrong type are rejected
 */
export function toConfigInput(
	value: JSONValue,
): Result.Result<HarnessConfigInput, InvalidConfig> {
	if (!isJSONObject(value)) {
		return Result.failure(invalidField("$", "expected a JSON object"));
	}
	const numbers: Partial<Record<NumericKey, number>> = {};
	for (const key of NUMERIC_KEYS) {
		const read = readNumber(value, key);
		if (Result.isFailure(read)) return read;
		if (read.value !== undefined) numbers[key] = read.value;
	}
	const subjects = readNames(value, "subjects");
	if (Result.isFailure(subjects)) return subjects;
	const laws = readNames(value, "laws");
	if (Result.isFailure(laws)) return laws;
	const input: HarnessConfigInput = {
		...numbers,
		subjects: subjects.value,
		laws: laws.value,
	};
	const shrink = value["shrink"];
	if (shrink === undefined) return Result.success(input);
	return typeof shrink === "boolean"
		? Result.success({ ...input, shrink })
		: Result.failure(invalidField("shrink", "expected a boolean"));
}

/**
 * Loads configuration overrides from disk.
 *
 * @param configPath - explicit file (must exist); defaults to ./lawful-sums.config.json (optional)
 * @returns overrides, or InvalidConfig when the file cannot be read or decoded
 *
 * @pure false - reads filesystem
 */
export function loadConfigFile(
	configPath?: string,
): Result.Result<HarnessConfigInput, InvalidConfig> {
	const resolved = configPath ?? path.resolve(process.cwd(), CONFIG_FILE_NAME);
	if (configPath === undefined && !fs.existsSync(resolved)) {
		return Result.success({});
	}
	return Result.flatMap(
		Result.fromCatching(
			(): JSONValue => JSON.parse(fs.readFileSync(resolved, "utf8")),
			(cause) =>
				new InvalidConfig({ field: resolved, detail: describeCause(cause) }),
		),
		toConfigInput,
	);
}
