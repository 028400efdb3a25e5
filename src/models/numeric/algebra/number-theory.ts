/**
 * @module algebra/number-theory
 * @description Greatest common divisor and least common multiple
 *
 * Inputs are non-negative safe integers.
 */

import { InvalidParamError, OverflowError, UndefinedOperationError } from '../../../core/errors';
import { failed, ok, type Outcome } from '../../../core/result';

export function checkNatural(name: string, value: number): InvalidParamError | undefined {
    if (!Number.isSafeInteger(value) || value < 0) {
        return new InvalidParamError(`${name} must be a non-negative integer, got ${value}`, { [name]: value });
    }
    return undefined;
}

function euclid(m: number, n: number): number {
    let a = m;
    let b = n;
    while (b !== 0) {
        const r = a % b;
        a = b;
        b = r;
    }
    return a;
}

/**
 * Euclid's algorithm. `gcd(0, n) = n`; `gcd(0, 0)` has no value and fails.
 */
export function gcd(m: number, n: number): Outcome<number> {
    const error = checkNatural('m', m) ?? checkNatural('n', n);
    if (error) return failed(error);

    if (m === 0 && n === 0) {
        return failed(new UndefinedOperationError('gcd(0, 0) is undefined', { m, n }));
    }
    return ok(euclid(m, n));
}

/**
 * `m * n / gcd(m, n)`, with `lcm(m, 0) = lcm(0, n) = 0`
 */
export function lcm(m: number, n: number): Outcome<number> {
    const error = checkNatural('m', m) ?? checkNatural('n', n);
    if (error) return failed(error);

    if (m === 0 || n === 0) {
        return ok(0);
    }

    // Divide first so the intermediate stays as small as the result
    const result = (m / euclid(m, n)) * n;
    if (!Number.isSafeInteger(result)) {
        return failed(new OverflowError(`lcm(${m}, ${n}) exceeds Number.MAX_SAFE_INTEGER`, { m, n }));
    }
    return ok(result);
}
