/**
 * @module polynomial
 * @description Dense real polynomials
 */

export * from './polynomial';
export * from './format';
