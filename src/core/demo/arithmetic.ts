// CHANGE: Throwing integer division and its Result-returning wrapper
// PURITY: CORE
// INVARIANT: divide throws DivisionByZero iff divisor = 0; safeDivide never throws
// COMPLEXITY: O(1)

import { DivisionByZero } from "../errors.js";
import * as Result from "../result.js";

/**
 * Truncating integer division.
 *
 * @throws DivisionByZero when `divisor` is 0
 */
export const divide = (dividend: number, divisor: number): number => {
	if (divisor === 0) throw new DivisionByZero({ dividend });
	return Math.trunc(dividend / divisor);
};

/**
 * @example
 * ```ts
 * safeDivide(1, 0) // Failure(DivisionByZero { dividend: 1 })
 * ```
 */
export const safeDivide = (
	dividend: number,
	divisor: number,
): Result.Result<number, DivisionByZero> =>
	Result.fromCatching(
		() => divide(dividend, divisor),
		(cause) =>
			cause instanceof DivisionByZero ? cause : new DivisionByZero({ dividend }),
	);
