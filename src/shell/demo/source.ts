// CHANGE: Blocking file read captured into a Result
// PURITY: SHELL (filesystem)
// INVARIANT: readSource never throws; I/O failures become ReadError
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";

import { describeCause, ReadError } from "../../core/errors.js";
import * as Result from "../../core/result.js";

/**
 * Reads a UTF-8 file synchronously.
 *
 * @pure false (reads filesystem)
 * @postcondition exactly one read attempt, no retry
 */
export const readSource = (path: string): Result.Result<string, ReadError> =>
	Result.fromCatching(
		() => fs.readFileSync(path, "utf8"),
		(cause) => new ReadError({ path, detail: describeCause(cause) }),
	);
