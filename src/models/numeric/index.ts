/**
 * @module src/models/numeric
 * @description Numerical Methods
 *
 * Contains:
 * - Calculus: ranges, fixed-step quadrature, forward difference, secant method
 * - Polynomial: dense real polynomials with exact derivative and integral
 * - Algebra: gcd / lcm, factorial / binomial
 */

import * as calculus from './calculus';
import * as polynomial from './polynomial';
import * as algebra from './algebra';

// Re-export as namespaces
export { calculus, polynomial, algebra };

// Direct exports for common functions
export * from './calculus';
export * from './polynomial';
export * from './algebra';
