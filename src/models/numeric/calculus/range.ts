/**
 * @module calculus/range
 * @description Validated closed interval
 */

import { InvalidRangeError } from '../../../core/errors';
import { failed, ok, unwrap, type Outcome } from '../../../core/result';
import type { Range } from './types';

/**
 * Build the interval [min, max]. Fails when max < min; equal bounds are fine.
 * The returned object is frozen.
 */
export function makeRange(min: number, max: number): Outcome<Range> {
    if (max < min) {
        return failed(new InvalidRangeError(min, max));
    }
    return ok(Object.freeze({ min, max }));
}

/**
 * Like {@link makeRange}, throwing InvalidRangeError instead
 */
export function createRange(min: number, max: number): Range {
    return unwrap(makeRange(min, max));
}

export function rangeWidth(range: Range): number {
    return range.max - range.min;
}

export function rangeMidpoint(range: Range): number {
    return (range.min + range.max) / 2;
}
