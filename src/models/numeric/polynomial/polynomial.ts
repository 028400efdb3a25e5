/**
 * @module polynomial/polynomial
 * @description Dense real polynomial with closed-form calculus
 *
 * `coefficients[k]` multiplies `x^k`, and there are always `degree + 1` of
 * them. A zero leading coefficient is kept: `[1, 0, 0]` stays degree 2.
 * Instances are immutable; every transformation returns a new polynomial.
 *
 * @example
 * ```typescript
 * // p(x) = 1 + 2x + 3x²
 * const p = Polynomial.of(1, 2, 3);
 * p.evaluate(2);                             // 17
 * p.differentiate().coefficients();          // [2, 6]
 * p.definiteIntegral(createRange(0, 1));     // 3
 * ```
 */

import {
    CoefficientBoundsError,
    IndexOutOfBoundsError,
    InvalidParamError,
    wrapError,
} from '../../../core/errors';
import { degraded, failed, ok, unwrap, type Outcome } from '../../../core/result';
import type { RealFunction, Range } from '../calculus/types';
import { formatPolynomial, type CoefficientFormatter } from './format';

export class Polynomial {
    private readonly coeffs: readonly number[];

    private constructor(coeffs: readonly number[]) {
        this.coeffs = coeffs;
    }

    // ==================== Constructors ====================

    /**
     * Copy the first `degree + 1` entries of `coefficients`.
     * Fails when `degree` is not a non-negative integer or the input is too
     * short; extra trailing entries are ignored.
     */
    static make(degree: number, coefficients: ArrayLike<number>): Outcome<Polynomial> {
        if (!Number.isSafeInteger(degree) || degree < 0) {
            return failed(new InvalidParamError(
                `degree must be a non-negative integer, got ${degree}`,
                { degree }
            ));
        }
        if (coefficients.length < degree + 1) {
            return failed(new CoefficientBoundsError(degree, coefficients.length));
        }

        let copy: number[];
        try {
            copy = new Array<number>(degree + 1);
        } catch (error) {
            return failed(wrapError(error));
        }
        for (let i = 0; i <= degree; i++) {
            copy[i] = coefficients[i];
        }
        return ok(new Polynomial(copy));
    }

    /**
     * Polynomial of degree `coefficients.length - 1`. Throws with no arguments.
     */
    static of(...coefficients: number[]): Polynomial {
        return unwrap(Polynomial.make(coefficients.length - 1, coefficients));
    }

    // ==================== Queries ====================

    get degree(): number {
        return this.coeffs.length - 1;
    }

    /**
     * Coefficient of `x^index`. An index past the degree degrades to the
     * leading coefficient instead of failing.
     */
    coefficient(index: number): Outcome<number> {
        if (!Number.isSafeInteger(index) || index < 0) {
            return failed(new InvalidParamError(
                `index must be a non-negative integer, got ${index}`,
                { index }
            ));
        }
        if (index > this.degree) {
            return degraded(this.leading(), new IndexOutOfBoundsError(index, this.degree));
        }
        return ok(this.coeffs[index]);
    }

    leading(): number {
        return this.coeffs[this.degree];
    }

    trailing(): number {
        return this.coeffs[0];
    }

    isConstant(): boolean {
        return this.degree === 0;
    }

    /** Copy of the coefficient array, lowest power first */
    coefficients(): number[] {
        return [...this.coeffs];
    }

    /**
     * Power sum `Σ c_k * x^k`, accumulated from k = 0 upward with
     * `Math.pow`. Not Horner: results agree bit-for-bit with a direct
     * term-by-term sum.
     */
    evaluate(x: number): number {
        let result = 0;
        for (let k = 0; k < this.coeffs.length; k++) {
            result += this.coeffs[k] * Math.pow(x, k);
        }
        return result;
    }

    // ==================== Calculus ====================

    /**
     * Power-rule derivative. The derivative of a constant is the degree-0
     * polynomial `[0]`.
     */
    differentiate(): Polynomial {
        if (this.degree === 0) {
            return new Polynomial([0]);
        }

        const result: number[] = new Array(this.degree);
        for (let k = 0; k < this.degree; k++) {
            result[k] = this.coeffs[k + 1] * (k + 1);
        }
        return new Polynomial(result);
    }

    /**
     * Antiderivative with integration constant `constant` as its trailing
     * coefficient.
     */
    antiderivative(constant = 0): Polynomial {
        const result: number[] = new Array(this.degree + 2);
        result[0] = constant;
        for (let k = 0; k <= this.degree; k++) {
            result[k + 1] = this.coeffs[k] / (k + 1);
        }
        return new Polynomial(result);
    }

    /**
     * Exact integral over `range`: `F(max) - F(min)` with `F` the
     * antiderivative with zero constant.
     */
    definiteIntegral(range: Range): number {
        const primitive = this.antiderivative(0);
        return primitive.evaluate(range.max) - primitive.evaluate(range.min);
    }

    // ==================== Comparison ====================

    /**
     * Ordering used by the classic API, reproduced as-is:
     * - different degrees: `this.degree - other.degree`
     * - same degree: `degree + 1 - i` for the first index `i` (from 0) whose
     *   coefficients differ under `!==`
     * - otherwise 0
     *
     * NaN coefficients never compare equal, so a polynomial holding NaN is
     * not equal to itself.
     */
    compare(other: Polynomial): number {
        if (this.degree !== other.degree) {
            return this.degree - other.degree;
        }
        for (let i = 0; i <= this.degree; i++) {
            if (this.coeffs[i] !== other.coeffs[i]) {
                return this.degree + 1 - i;
            }
        }
        return 0;
    }

    equals(other: Polynomial): boolean {
        return this.compare(other) === 0;
    }

    duplicate(): Polynomial {
        return new Polynomial([...this.coeffs]);
    }

    // ==================== Adapters ====================

    /**
     * Real-function view of this polynomial, for the quadrature and
     * differentiation routines. Each handle is bound to its own polynomial.
     */
    toFunction(): RealFunction {
        return (x: number) => this.evaluate(x);
    }

    format(formatter?: CoefficientFormatter): string {
        return formatPolynomial(this, formatter);
    }

    toString(): string {
        return this.format();
    }
}
