/**
 * @module calculus/types
 * @description Type definitions for the calculus routines
 */

/**
 * Real function of one real variable, supplied by the caller
 */
export type RealFunction = (x: number) => number;

/**
 * Closed interval [min, max] with min <= max
 */
export interface Range {
    readonly min: number;
    readonly max: number;
}
