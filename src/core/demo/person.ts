// CHANGE: Decode a person record by chaining fromCatching → flatMap → mapError
// PURITY: CORE
// FORMAT THEOREM: decodePerson(t) = Success(p) ⇔ JSON.parse(t) is an object with string name and integer age
// INVARIANT: JSON.parse failures and shape mismatches both surface as DecodeError
// COMPLEXITY: O(n) where n = |text|

import { pipe } from "effect";

import { DecodeError, describeCause } from "../errors.js";
import * as Result from "../result.js";

export interface Person {
	readonly name: string;
	readonly age: number;
}

type JSONValue =
	| string
	| number
	| boolean
	| null
	| readonly JSONValue[]
	| { readonly [key: string]: JSONValue };

const isJSONObject = (
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } =>
	value !== null && typeof value === "object" && !Array.isArray(value);

const parseJSON = (text: string): Result.Result<JSONValue, DecodeError> =>
	Result.fromCatching(
		(): JSONValue => JSON.parse(text),
		(cause) => new DecodeError({ detail: describeCause(cause) }),
	);

const toPerson = (value: JSONValue): Result.Result<Person, string> => {
	if (!isJSONObject(value)) return Result.failure("expected a JSON object");
	const { name, age } = value;
	if (typeof name !== "string") return Result.failure('field "name" must be a string');
	if (typeof age !== "number" || !Number.isInteger(age)) {
		return Result.failure('field "age" must be an integer');
	}
	return Result.success({ name, age });
};

/**
 * Decodes `{ "name": string, "age": integer }`.
 *
 * @pure true
 * @complexity O(n)
 */
export const decodePerson = (text: string): Result.Result<Person, DecodeError> =>
	pipe(
		parseJSON(text),
		Result.flatMap((value) =>
			Result.mapError(toPerson(value), (detail) => new DecodeError({ detail })),
		),
	);

export const personAge = <E>(
	person: Result.Result<Person, E>,
): Result.Result<number, E> => Result.map(person, (p) => p.age);
