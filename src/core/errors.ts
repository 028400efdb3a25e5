/**
 * @module core/errors
 * @description Unified error types and error codes for the numeric routines
 *
 * Every failure a routine can report has a string code here and a class that
 * carries it. The legacy integer status for each code lives in
 * {@link statusForCode}.
 */

import type { StatusCode } from './status';

// ==================== Error Codes ====================

/**
 * Standard error codes for the numeric library
 */
export const ErrorCodes = {
    // Allocation
    /** Storage for a result could not be obtained */
    ALLOCATION_FAILURE: 'ALLOCATION_FAILURE',

    // Argument Errors
    /** Generic invalid argument (negative count, non-integer, ...) */
    INVALID_PARAM: 'INVALID_PARAM',
    /** Range with max < min */
    INVALID_RANGE: 'INVALID_RANGE',
    /** Coefficient array shorter than degree + 1 */
    COEFFICIENT_BOUNDS: 'COEFFICIENT_BOUNDS',
    /** Negative derivative step */
    NEGATIVE_STEP: 'NEGATIVE_STEP',

    // Degraded Results
    /** Coefficient index beyond the degree; leading coefficient returned instead */
    INDEX_OUT_OF_BOUNDS: 'INDEX_OUT_OF_BOUNDS',

    // Arithmetic Errors
    /** Operation has no defined result, e.g. gcd(0, 0) */
    ALGEBRAICALLY_UNDEFINED: 'ALGEBRAICALLY_UNDEFINED',
    /** Integer result exceeds the safe integer range */
    OVERFLOW: 'OVERFLOW',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the numeric library
 */
export class NumericError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'NumericError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, NumericError);
        }
    }

    /** Legacy integer status for this error */
    get status(): StatusCode {
        return statusForCode(this.code);
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        status: StatusCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            status: this.status,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Invalid argument
 */
export class InvalidParamError extends NumericError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INVALID_PARAM, message, details);
        this.name = 'InvalidParamError';
    }
}

/**
 * Range whose upper bound lies below its lower bound
 */
export class InvalidRangeError extends NumericError {
    readonly min: number;
    readonly max: number;

    constructor(min: number, max: number) {
        super(ErrorCodes.INVALID_RANGE, `Invalid range: max (${max}) < min (${min})`, { min, max });
        this.name = 'InvalidRangeError';
        this.min = min;
        this.max = max;
    }
}

/**
 * Too few coefficients for the requested degree
 */
export class CoefficientBoundsError extends NumericError {
    readonly degree: number;
    readonly received: number;

    constructor(degree: number, received: number) {
        super(
            ErrorCodes.COEFFICIENT_BOUNDS,
            `Degree ${degree} needs ${degree + 1} coefficients, got ${received}`,
            { degree, received }
        );
        this.name = 'CoefficientBoundsError';
        this.degree = degree;
        this.received = received;
    }
}

/**
 * Coefficient index past the degree (degraded, never thrown by the library)
 */
export class IndexOutOfBoundsError extends NumericError {
    constructor(index: number, degree: number) {
        super(
            ErrorCodes.INDEX_OUT_OF_BOUNDS,
            `Coefficient index ${index} exceeds degree ${degree}; leading coefficient used`,
            { index, degree }
        );
        this.name = 'IndexOutOfBoundsError';
    }
}

/**
 * Operation with no defined result
 */
export class UndefinedOperationError extends NumericError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.ALGEBRAICALLY_UNDEFINED, message, details);
        this.name = 'UndefinedOperationError';
    }
}

/**
 * Negative derivative step
 */
export class NegativeStepError extends NumericError {
    constructor(step: number) {
        super(ErrorCodes.NEGATIVE_STEP, `Derivative step must not be negative, got ${step}`, { step });
        this.name = 'NegativeStepError';
    }
}

/**
 * Integer overflow past Number.MAX_SAFE_INTEGER
 */
export class OverflowError extends NumericError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.OVERFLOW, message, details);
        this.name = 'OverflowError';
    }
}

// ==================== Error Utilities ====================

const STATUS_BY_CODE: Record<ErrorCode, StatusCode> = {
    ALLOCATION_FAILURE: 101,
    INVALID_PARAM: 102,
    COEFFICIENT_BOUNDS: 102,
    ALGEBRAICALLY_UNDEFINED: 201,
    INDEX_OUT_OF_BOUNDS: 401,
    OVERFLOW: 501,
    INVALID_RANGE: 506,
    NEGATIVE_STEP: 601,
};

/**
 * Map an error code to its legacy integer status
 */
export function statusForCode(code: ErrorCode): StatusCode {
    return STATUS_BY_CODE[code];
}

/**
 * Check if an error is a NumericError
 */
export function isNumericError(error: unknown): error is NumericError {
    return error instanceof NumericError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isNumericError(error) && error.code === code;
}

/**
 * Wrap any error into a NumericError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INVALID_PARAM): NumericError {
    if (isNumericError(error)) {
        return error;
    }

    if (error instanceof RangeError) {
        // Array/TypedArray allocation failures surface as RangeError
        return new NumericError(ErrorCodes.ALLOCATION_FAILURE, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    if (error instanceof Error) {
        return new NumericError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new NumericError(defaultCode, String(error));
}
