// CHANGE: One-line rendering of domain errors
// PURITY: CORE
// INVARIANT: Every AppError variant is handled (exhaustive on _tag)
// COMPLEXITY: O(1)

import { Match } from "effect";

import type { AppError } from "../errors.js";

export const formatAppError = (error: AppError): string =>
	Match.valueTags(error, {
		InvalidConfig: (e) => `Invalid configuration (${e.field}): ${e.detail}`,
		HarnessAborted: (e) =>
			`Harness aborted (${e.subject} / ${e.law}): ${e.detail}`,
		DivisionByZero: (e) => `Division by zero: ${e.dividend} / 0`,
		DecodeError: (e) => `Decode error: ${e.detail}`,
		ReadError: (e) => `Cannot read ${e.path}: ${e.detail}`,
	});
