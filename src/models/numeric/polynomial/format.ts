/**
 * @module polynomial/format
 * @description Plain-text rendering of polynomials
 *
 * Terms are written lowest power first, each as a sign, the absolute
 * coefficient and the power: `[1, -2.5, 0]` renders as
 * `+ 1x^0 - 2.5x^1 + 0x^2`.
 */

import type { Polynomial } from './polynomial';

/**
 * Renders a non-negative coefficient
 */
export type CoefficientFormatter = (value: number) => string;

function stripTrailingZeros(text: string): string {
    return text.includes('.') ? text.replace(/\.?0+$/, '') : text;
}

/**
 * Shortest of fixed and exponential notation with `precision` significant
 * digits and no trailing zeros, the way printf's `%g` writes it
 * (`1e-05`, `123457`, `1.23457e+06`).
 */
export function formatGeneral(value: number, precision = 6): string {
    if (Number.isNaN(value)) return 'nan';
    if (!Number.isFinite(value)) return value < 0 ? '-inf' : 'inf';
    if (value === 0) return Object.is(value, -0) ? '-0' : '0';

    // toFixed below takes at most 100 digits
    const p = Math.min(96, Math.max(1, Math.floor(precision)));
    const exponential = value.toExponential(p - 1);
    const exponent = Number(exponential.slice(exponential.indexOf('e') + 1));

    if (exponent < -4 || exponent >= p) {
        const mantissa = exponential.slice(0, exponential.indexOf('e'));
        const sign = exponent < 0 ? '-' : '+';
        const digits = String(Math.abs(exponent)).padStart(2, '0');
        return `${stripTrailingZeros(mantissa)}e${sign}${digits}`;
    }
    return stripTrailingZeros(value.toFixed(p - 1 - exponent));
}

export function formatPolynomial(
    polynomial: Polynomial,
    formatter: CoefficientFormatter = formatGeneral
): string {
    return polynomial
        .coefficients()
        .map((c, k) => `${c < 0 ? '-' : '+'} ${formatter(Math.abs(c))}x^${k}`)
        .join(' ');
}
