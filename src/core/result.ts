/**
 * @module core/result
 * @description Tagged outcome of a fallible numeric routine
 *
 * - `ok`: the computation succeeded
 * - `degraded`: a usable fallback value is returned, with the reason
 * - `failed`: no value, only the error
 */

import type { NumericError } from './errors';
import type { StatusCode } from './status';

// ==================== Types ====================

export interface Ok<T> {
    readonly kind: 'ok';
    readonly value: T;
}

export interface Degraded<T> {
    readonly kind: 'degraded';
    readonly value: T;
    readonly error: NumericError;
}

export interface Failed {
    readonly kind: 'failed';
    readonly error: NumericError;
}

export type Outcome<T> = Ok<T> | Degraded<T> | Failed;

// ==================== Constructors ====================

export function ok<T>(value: T): Ok<T> {
    return { kind: 'ok', value };
}

export function degraded<T>(value: T, error: NumericError): Degraded<T> {
    return { kind: 'degraded', value, error };
}

export function failed(error: NumericError): Failed {
    return { kind: 'failed', error };
}

// ==================== Queries ====================

export function isOk<T>(outcome: Outcome<T>): outcome is Ok<T> {
    return outcome.kind === 'ok';
}

/**
 * True for `ok` and `degraded` outcomes
 */
export function hasValue<T>(outcome: Outcome<T>): outcome is Ok<T> | Degraded<T> {
    return outcome.kind !== 'failed';
}

/**
 * Return the value, or throw the error of a failed outcome.
 * A degraded outcome yields its fallback value.
 */
export function unwrap<T>(outcome: Outcome<T>): T {
    if (outcome.kind === 'failed') {
        throw outcome.error;
    }
    return outcome.value;
}

export function unwrapOr<T>(outcome: Outcome<T>, fallback: T): T {
    return outcome.kind === 'failed' ? fallback : outcome.value;
}

/**
 * Legacy integer status of an outcome (0 when ok)
 */
export function statusOf<T>(outcome: Outcome<T>): StatusCode {
    return outcome.kind === 'ok' ? 0 : outcome.error.status;
}
