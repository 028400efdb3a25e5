/**
 * @module compat
 * @description Status-signal API
 *
 * Flat functions with the classic calling convention: each returns a plain
 * value and records the outcome in the process-wide status signal
 * (`getStatus()`), logging it through the active logger. On failure the
 * return value is the distinguished one: `null` for a missing object, `0`
 * for a number, the fallback for a degraded result.
 *
 * Pure queries (`rangeWidth`, `polyDegree`, `getBins`, `getStep`) leave the
 * signal alone.
 *
 * @example
 * ```typescript
 * import { compat, core } from 'numerix';
 *
 * const p = compat.makePolynomial(2, [1]);   // null
 * core.getStatus();                          // 102
 *
 * const q = compat.makePolynomial(1, [1, 2]);
 * if (q) compat.polyCoefficient(q, 5);      // 2, status 401
 * ```
 */

import { settings } from '../core/config';
import { getLogger } from '../core/logging';
import { ok, statusOf, unwrapOr, type Outcome } from '../core/result';
import { setStatus } from '../core/status';
import * as algebra from '../models/numeric/algebra';
import * as calculus from '../models/numeric/calculus';
import { Polynomial, type CoefficientFormatter } from '../models/numeric/polynomial';
import type { RealFunction, Range } from '../models/numeric/calculus';

// ==================== Signal Plumbing ====================

function track<T>(operation: string, outcome: Outcome<T>, fallback: T): T {
    const status = statusOf(outcome);
    setStatus(status);
    getLogger().logOperation({
        operation,
        status,
        message: outcome.kind === 'ok' ? undefined : outcome.error.message,
    });
    return unwrapOr(outcome, fallback);
}

function succeed<T>(operation: string, value: T): T {
    return track(operation, ok(value), value);
}

// ==================== Configuration ====================

export function setBins(bins: number): void {
    settings.setBins(bins);
}

export function getBins(): number {
    return settings.bins;
}

/** A negative step sets status 601 and keeps the previous step */
export function setStep(step: number): void {
    settings.setStep(step);
}

export function getStep(): number {
    return settings.step;
}

// ==================== Range ====================

export function makeRange(min: number, max: number): Range | null {
    return track<Range | null>('makeRange', calculus.makeRange(min, max), null);
}

export function rangeWidth(range: Range): number {
    return calculus.rangeWidth(range);
}

// ==================== Quadrature ====================

export function integrateBins(f: RealFunction, range: Range): number {
    return succeed('integrateBins', calculus.integrateBins(f, range));
}

export function integrateRect(f: RealFunction, range: Range, subintervals: number): number {
    return track('integrateRect', calculus.integrateRect(f, range, subintervals), 0);
}

export function integrateTrap(f: RealFunction, range: Range, subintervals: number): number {
    return track('integrateTrap', calculus.integrateTrap(f, range, subintervals), 0);
}

// ==================== Differentiation ====================

export function derivativeAt(f: RealFunction, x: number): number {
    return succeed('derivativeAt', calculus.derivativeAt(f, x));
}

export function secantRoot(f: RealFunction, range: Range, iterations: number): number {
    return track('secantRoot', calculus.secantRoot(f, range, iterations), 0);
}

// ==================== Polynomial ====================

export function makePolynomial(degree: number, coefficients: ArrayLike<number>): Polynomial | null {
    return track<Polynomial | null>('makePolynomial', Polynomial.make(degree, coefficients), null);
}

export function polyDegree(p: Polynomial): number {
    return p.degree;
}

/** Index past the degree: returns the leading coefficient, status 401 */
export function polyCoefficient(p: Polynomial, index: number): number {
    return track('polyCoefficient', p.coefficient(index), 0);
}

export function polyLeading(p: Polynomial): number {
    return succeed('polyLeading', p.leading());
}

export function polyTrailing(p: Polynomial): number {
    return succeed('polyTrailing', p.trailing());
}

export function polyEvaluate(p: Polynomial, x: number): number {
    return succeed('polyEvaluate', p.evaluate(x));
}

export function polyDifferentiate(p: Polynomial): Polynomial {
    return succeed('polyDifferentiate', p.differentiate());
}

export function polyAntiderivative(p: Polynomial, constant: number): Polynomial {
    return succeed('polyAntiderivative', p.antiderivative(constant));
}

export function polyDefiniteIntegral(p: Polynomial, range: Range): number {
    return succeed('polyDefiniteIntegral', p.definiteIntegral(range));
}

export function polyIsConstant(p: Polynomial): boolean {
    return succeed('polyIsConstant', p.isConstant());
}

export function polyCompare(p: Polynomial, q: Polynomial): number {
    return succeed('polyCompare', p.compare(q));
}

export function polyDuplicate(p: Polynomial): Polynomial {
    return succeed('polyDuplicate', p.duplicate());
}

export function polyToFunction(p: Polynomial): RealFunction {
    return succeed('polyToFunction', p.toFunction());
}

export function polyFormat(p: Polynomial, formatter?: CoefficientFormatter): string {
    return succeed('polyFormat', p.format(formatter));
}

// ==================== Algebra ====================

/** gcd(0, 0) returns 0 with status 201 */
export function gcd(m: number, n: number): number {
    return track('gcd', algebra.gcd(m, n), 0);
}

export function lcm(m: number, n: number): number {
    return track('lcm', algebra.lcm(m, n), 0);
}

/** Overflow returns 0 with status 501 */
export function factorial(n: number): number {
    return track('factorial', algebra.factorial(n), 0);
}

export function binomial(m: number, n: number): number {
    return track('binomial', algebra.binomial(m, n), 0);
}
