/**
 * @module algebra/combinatorics
 * @description Factorial and binomial coefficient over safe integers
 */

import { InvalidParamError, OverflowError } from '../../../core/errors';
import { failed, ok, type Outcome } from '../../../core/result';
import { checkNatural } from './number-theory';

/**
 * `n!`. Fails with OverflowError once the result leaves the safe integer
 * range (n >= 19).
 */
export function factorial(n: number): Outcome<number> {
    const error = checkNatural('n', n);
    if (error) return failed(error);

    let result = 1;
    for (let i = 2; i <= n; i++) {
        result *= i;
        if (!Number.isSafeInteger(result)) {
            return failed(new OverflowError(`${n}! exceeds Number.MAX_SAFE_INTEGER`, { n }));
        }
    }
    return ok(result);
}

/**
 * `C(m, n) = m! / (n! (m - n)!)`, computed as a running product. Exact as
 * long as every intermediate product is a safe integer; OverflowError
 * otherwise.
 */
export function binomial(m: number, n: number): Outcome<number> {
    const error = checkNatural('m', m) ?? checkNatural('n', n);
    if (error) return failed(error);

    if (m < n) {
        return failed(new InvalidParamError(`binomial(${m}, ${n}) needs m >= n`, { m, n }));
    }

    const k = Math.min(n, m - n);
    let result = 1;
    for (let i = 1; i <= k; i++) {
        // result * (m - k + i) is divisible by i: it is C(m - k + i, i) * i
        const numerator = result * (m - k + i);
        if (!Number.isSafeInteger(numerator)) {
            return failed(new OverflowError(`binomial(${m}, ${n}) exceeds Number.MAX_SAFE_INTEGER`, { m, n }));
        }
        result = numerator / i;
    }
    return ok(result);
}
