/**
 * @module core
 * @description Shared infrastructure for the numeric routines
 *
 * ## Modules
 * - `errors`: Unified error types and codes
 * - `result`: Tagged outcome (ok / degraded / failed) of fallible routines
 * - `status`: Process-wide last-status signal
 * - `logging`: Structured logging of outcomes and config changes
 * - `config`: Bin count and derivative step
 */

// ==================== Errors ====================

export {
    ErrorCodes,
    NumericError,
    InvalidParamError,
    InvalidRangeError,
    CoefficientBoundsError,
    IndexOutOfBoundsError,
    UndefinedOperationError,
    NegativeStepError,
    OverflowError,
    statusForCode,
    isNumericError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';

// ==================== Result ====================

export type { Ok, Degraded, Failed, Outcome } from './result';

export {
    ok,
    degraded,
    failed,
    isOk,
    hasValue,
    unwrap,
    unwrapOr,
    statusOf,
} from './result';

// ==================== Status ====================

export type { StatusCode } from './status';

export {
    StatusCodes,
    isStatusCode,
    getStatus,
    setStatus,
    resetStatus,
    describeStatus,
} from './status';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    OperationLogEntry,
    ConfigLogEntry,
    LogEntry,
    Logger,
    LoggerConfig,
} from './logging';

export {
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
    getLogger,
    setLogger,
} from './logging';

// ==================== Config ====================

export type { NumericConfig, ValidationResult } from './config';

export {
    DEFAULT_BINS,
    DEFAULT_STEP,
    createNumericConfig,
    validateNumericConfig,
    serializeNumericConfig,
    deserializeNumericConfig,
    Settings,
    settings,
} from './config';
