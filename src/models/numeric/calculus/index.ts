/**
 * @module calculus
 * @description One-dimensional numeric calculus
 *
 * Provides:
 * - Range: validated closed interval
 * - Quadrature: bin sum, rectangle and trapezoidal rules
 * - Differentiation: forward difference, secant root finder
 */

export * from './types';
export * from './range';
export * from './integrate';
export * from './diff';
