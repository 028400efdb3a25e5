/**
 * @module core/status
 * @description Process-wide "last status" signal
 *
 * Written by the compat layer and the settings setters, never read by the
 * routines themselves. Read it right after the call you care about: the next
 * call overwrites it.
 *
 * Each worker thread loads its own copy of this module, so the cell is
 * per-thread.
 */

// ==================== Status Codes ====================

export const StatusCodes = {
    OK: 0,
    BAD_ALLOC: 101,
    INVALID_PARAM: 102,
    ALGEBRA_INVALID_OP: 201,
    POLY_INDEX_GT_DEGREE: 401,
    FACTORIAL_OVERFLOW: 501,
    INVALID_RANGE: 506,
    NEGATIVE_STEP: 601,
} as const;

export type StatusCode = (typeof StatusCodes)[keyof typeof StatusCodes];

const DESCRIPTIONS: Record<StatusCode, string> = {
    0: 'OK',
    101: 'allocation failure',
    102: 'invalid argument',
    201: 'invalid algebraic operation',
    401: 'coefficient index exceeds degree',
    501: 'factorial overflow',
    506: 'invalid range (max < min)',
    601: 'negative step set for derivative',
};

// ==================== Signal ====================

let lastStatus: StatusCode = StatusCodes.OK;

export function isStatusCode(value: number): value is StatusCode {
    return Object.prototype.hasOwnProperty.call(DESCRIPTIONS, value);
}

export function getStatus(): StatusCode {
    return lastStatus;
}

/**
 * Overwrite the signal. Throws on a number outside the status table.
 */
export function setStatus(code: number): void {
    if (!isStatusCode(code)) {
        throw new RangeError(`Unknown status code: ${code}`);
    }
    lastStatus = code;
}

export function resetStatus(): void {
    lastStatus = StatusCodes.OK;
}

export function describeStatus(code: StatusCode): string {
    return DESCRIPTIONS[code];
}
