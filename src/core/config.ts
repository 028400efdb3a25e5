/**
 * @module core/config
 * @description Process-wide numeric tunables
 *
 * Two values steer the approximate routines:
 * - `bins`: number of bins used by bin-sum integration
 * - `step`: forward-difference step used by numeric differentiation
 *
 * A config can be created with defaults, validated, serialized and applied to
 * the shared {@link settings} instance.
 */

import { InvalidParamError, NegativeStepError, NumericError } from './errors';
import { getLogger } from './logging';
import { failed, ok, statusOf, type Outcome } from './result';
import { setStatus } from './status';

// ==================== Constants ====================

export const DEFAULT_BINS = 1000;
export const DEFAULT_STEP = 1e-8;

// ==================== Types ====================

export interface NumericConfig {
    /** Bin count for bin-sum integration (positive integer) */
    bins: number;
    /** Forward-difference step (non-negative) */
    step: number;
}

/**
 * Validation result for NumericConfig
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Factory Functions ====================

/**
 * Create a NumericConfig with defaults
 */
export function createNumericConfig(input: Partial<NumericConfig> = {}): NumericConfig {
    return {
        bins: input.bins ?? DEFAULT_BINS,
        step: input.step ?? DEFAULT_STEP,
    };
}

// ==================== Validation ====================

function checkBins(bins: unknown): string | undefined {
    if (typeof bins !== 'number' || !Number.isSafeInteger(bins) || bins <= 0) {
        return 'bins must be a positive integer';
    }
    return undefined;
}

function checkStep(step: unknown): string | undefined {
    if (typeof step !== 'number' || Number.isNaN(step)) {
        return 'step must be a number';
    }
    if (step < 0) {
        return 'step must not be negative';
    }
    return undefined;
}

/**
 * Validate a NumericConfig
 */
export function validateNumericConfig(config: NumericConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const binsError = checkBins(config.bins);
    if (binsError) errors.push(binsError);

    const stepError = checkStep(config.step);
    if (stepError) errors.push(stepError);

    // Warnings
    if (!stepError && config.step === 0) {
        warnings.push('step is 0: derivatives will divide by zero');
    }
    if (!binsError && config.bins > 1e7) {
        warnings.push(`bins=${config.bins} is large: rounding error may dominate`);
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

// ==================== Serialization ====================

/**
 * Serialize NumericConfig to a canonical JSON string
 */
export function serializeNumericConfig(config: NumericConfig): string {
    return JSON.stringify({ bins: config.bins, step: config.step }, null, 2);
}

/**
 * Deserialize JSON string to NumericConfig; missing keys take defaults
 */
export function deserializeNumericConfig(json: string): NumericConfig {
    const parsed: unknown = JSON.parse(json);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new InvalidParamError('Numeric config must be a JSON object');
    }

    const input: Partial<NumericConfig> = {};
    if ('bins' in parsed) {
        const error = checkBins(parsed.bins);
        if (error || typeof parsed.bins !== 'number') {
            throw new InvalidParamError(`Invalid numeric config: ${error}`, { bins: parsed.bins });
        }
        input.bins = parsed.bins;
    }
    if ('step' in parsed) {
        const error = checkStep(parsed.step);
        if (error || typeof parsed.step !== 'number') {
            throw new InvalidParamError(`Invalid numeric config: ${error}`, { step: parsed.step });
        }
        input.step = parsed.step;
    }

    return createNumericConfig(input);
}

// ==================== Settings ====================

/**
 * Holder of the current tunables. Setters validate, write the status signal
 * and log the change; a rejected value leaves the stored one untouched.
 */
export class Settings {
    private current: NumericConfig = createNumericConfig();

    get bins(): number {
        return this.current.bins;
    }

    get step(): number {
        return this.current.step;
    }

    setBins(bins: number): Outcome<number> {
        const error = checkBins(bins);
        const outcome: Outcome<number> = error
            ? failed(new InvalidParamError(error, { bins }))
            : ok(bins);
        return this.commit('bins', bins, outcome);
    }

    setStep(step: number): Outcome<number> {
        let outcome: Outcome<number>;
        if (step < 0) {
            outcome = failed(new NegativeStepError(step));
        } else if (Number.isNaN(step)) {
            outcome = failed(new InvalidParamError('step must be a number', { step }));
        } else {
            outcome = ok(step);
        }
        return this.commit('step', step, outcome);
    }

    /**
     * Apply a whole config. Nothing changes unless every field is valid.
     */
    apply(config: NumericConfig): Outcome<NumericConfig> {
        const validation = validateNumericConfig(config);
        if (!validation.valid) {
            const error: NumericError = config.step < 0
                ? new NegativeStepError(config.step)
                : new InvalidParamError(validation.errors.join('; '), validation);
            setStatus(error.status);
            return failed(error);
        }
        this.setBins(config.bins);
        this.setStep(config.step);
        return ok(this.snapshot());
    }

    snapshot(): NumericConfig {
        return { ...this.current };
    }

    /** Restore defaults without touching the status signal */
    reset(): void {
        this.current = createNumericConfig();
    }

    private commit(key: 'bins' | 'step', requested: number, outcome: Outcome<number>): Outcome<number> {
        const previous = this.current[key];
        if (outcome.kind === 'ok') {
            this.current = { ...this.current, [key]: outcome.value };
        }

        const status = statusOf(outcome);
        setStatus(status);
        getLogger().logConfig({ key, previous, requested, status });
        return outcome;
    }
}

/**
 * Shared settings read by the integration and differentiation routines
 */
export const settings = new Settings();
