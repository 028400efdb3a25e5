/**
 * @module calculus/diff
 * @description Numeric differentiation and secant root finding
 *
 * Neither routine guards its arithmetic: a zero step, a flat secant or a
 * discontinuous `f` yield whatever IEEE 754 produces (Infinity, NaN).
 */

import { settings } from '../../../core/config';
import { InvalidParamError } from '../../../core/errors';
import { failed, ok, type Outcome } from '../../../core/result';
import type { RealFunction, Range } from './types';

/**
 * Forward difference `(f(x + dx) - f(x)) / dx` with `dx = settings.step`
 */
export function derivativeAt(f: RealFunction, x: number): number {
    const dx = settings.step;
    return (f(x + dx) - f(x)) / dx;
}

/**
 * Secant method started from the range endpoints.
 *
 * Runs exactly `iterations` steps of
 * `x2 = x1 - f(x1) (x1 - x0) / (f(x1) - f(x0))` from `x0 = min`, `x1 = max`
 * and returns the last `x2`. There is no convergence test, so once the
 * iterates coincide further steps produce NaN.
 *
 * @example
 * ```typescript
 * const root = secantRoot(x => x * x - 612, createRange(10, 30), 5);
 * unwrap(root); // ≈ 24.7386337
 * ```
 */
export function secantRoot(f: RealFunction, range: Range, iterations: number): Outcome<number> {
    if (!Number.isSafeInteger(iterations) || iterations <= 0) {
        return failed(new InvalidParamError(
            `iterations must be a positive integer, got ${iterations}`,
            { iterations }
        ));
    }

    let x0 = range.min;
    let x1 = range.max;
    let f0 = f(x0);
    let x2 = x1;
    for (let i = 0; i < iterations; i++) {
        const f1 = f(x1);
        x2 = x1 - f1 * (x1 - x0) / (f1 - f0);
        x0 = x1;
        f0 = f1;
        x1 = x2;
    }
    return ok(x2);
}
