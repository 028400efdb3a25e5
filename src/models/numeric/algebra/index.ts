/**
 * @module algebra
 * @description Integer number theory and combinatorics
 */

export { gcd, lcm } from './number-theory';
export { factorial, binomial } from './combinatorics';
