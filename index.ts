/**
 * @packageDocumentation
 * @module numerix
 *
 * numerix: small numerical utility library
 *
 * ## Modules
 *
 * - `numeric` - Calculus (ranges, quadrature, forward difference, secant),
 *   polynomials, integer algebra
 * - `core` - Errors, outcomes, status signal, logging, configuration
 * - `compat` - Flat API reporting through the process-wide status signal
 *
 * ## Usage Example
 * ```typescript
 * import { numeric, core } from 'numerix';
 *
 * const p = numeric.Polynomial.of(0, 0, 1);            // x²
 * const r = numeric.createRange(0, 3);
 *
 * p.definiteIntegral(r);                               // 9
 * core.unwrap(numeric.integrateTrap(p.toFunction(), r, 100));
 * ```
 *
 * @license MIT
 */

// ==================== Core ====================
export * as core from './src/core';

// ==================== Numerical Methods ====================
export * as numeric from './src/models/numeric';

// ==================== Status-signal API ====================
export * as compat from './src/compat';

// ==================== Version ====================
export const VERSION = '1.0.0';
