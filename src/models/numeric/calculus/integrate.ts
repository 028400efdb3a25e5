/**
 * @module calculus/integrate
 * @description Fixed-step quadrature of one-dimensional real functions
 *
 * Three rules are provided:
 * - bin sum: left-endpoint rectangles, bin count from `settings.bins`
 * - rectangle rule (single panel or composite, see the note on {@link integrateRect})
 * - trapezoidal rule (single panel or composite)
 *
 * No rule adapts its step or estimates its error.
 */

import { settings } from '../../../core/config';
import { InvalidParamError } from '../../../core/errors';
import { failed, ok, type Outcome } from '../../../core/result';
import { rangeMidpoint, rangeWidth } from './range';
import type { RealFunction, Range } from './types';

function checkSubintervals(subintervals: number): InvalidParamError | undefined {
    if (!Number.isSafeInteger(subintervals) || subintervals < 0) {
        return new InvalidParamError(
            `subintervals must be a non-negative integer, got ${subintervals}`,
            { subintervals }
        );
    }
    return undefined;
}

/**
 * Left-endpoint bin sum over `settings.bins` equal bins.
 *
 * Samples `f` at `min + i * step` for `i = 0 .. bins - 1`, exactly `bins`
 * times. The point is computed from the counter rather than accumulated, so
 * rounding cannot add or drop a bin.
 */
export function integrateBins(f: RealFunction, range: Range): number {
    const n = settings.bins;
    const step = rangeWidth(range) / n;

    let area = 0;
    for (let i = 0; i < n; i++) {
        area += step * f(range.min + i * step);
    }
    return area;
}

/**
 * Rectangle rule.
 *
 * With `subintervals = 0` this is the midpoint rule on one panel:
 * `(b - a) * f((a + b) / 2)`.
 *
 * With `n > 0` panels of width `h = (b - a) / n` it returns
 * `h * f((a + b) / 2 + Σ_{k=1}^{n-1} (a + k h))`: `f` is sampled once, at the
 * midpoint shifted by the sum of the interior panel edges. This is not the
 * textbook composite midpoint rule and converges to the integral only in
 * special cases; prefer {@link integrateTrap}.
 *
 * @deprecated Use integrateTrap for composite integration.
 */
export function integrateRect(f: RealFunction, range: Range, subintervals: number): Outcome<number> {
    const error = checkSubintervals(subintervals);
    if (error) return failed(error);

    const width = rangeWidth(range);
    const mid = rangeMidpoint(range);
    if (subintervals === 0) {
        return ok(width * f(mid));
    }

    const head = width / subintervals;
    let edges = 0;
    for (let k = 1; k <= subintervals - 1; k++) {
        edges += range.min + k * head;
    }
    return ok(head * f(mid + edges));
}

/**
 * Trapezoidal rule.
 *
 * `subintervals = 0`: `(b - a) * (f(a) + f(b)) / 2`.
 * Otherwise the composite rule over `n` equal panels of width `h`:
 * `h * ((f(a) + f(b)) / 2 + Σ_{k=1}^{n-1} f(a + k h))`.
 */
export function integrateTrap(f: RealFunction, range: Range, subintervals: number): Outcome<number> {
    const error = checkSubintervals(subintervals);
    if (error) return failed(error);

    const width = rangeWidth(range);
    const ends = f(range.min) + f(range.max);
    if (subintervals === 0) {
        return ok(width * ends / 2);
    }

    const head = width / subintervals;
    let interior = 0;
    for (let k = 1; k <= subintervals - 1; k++) {
        interior += f(range.min + k * head);
    }
    return ok(head * (ends / 2 + interior));
}
