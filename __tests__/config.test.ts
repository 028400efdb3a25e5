/**
 * Numeric Config Tests
 * create / validate / serialize, and the shared settings holder
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
    DEFAULT_BINS,
    DEFAULT_STEP,
    createNumericConfig,
    validateNumericConfig,
    serializeNumericConfig,
    deserializeNumericConfig,
    settings,
} from '../src/core/config';
import { InvalidParamError, NegativeStepError } from '../src/core/errors';
import { setLogger, type Logger, type MemoryLogger } from '../src/core/logging';
import { getStatus } from '../src/core/status';
import { isolateGlobals } from './test-utils';

let logger: MemoryLogger;
let previousLogger: Logger;

beforeEach(() => {
    const isolated = isolateGlobals();
    logger = isolated.logger;
    previousLogger = isolated.previous;
});

afterEach(() => {
    settings.reset();
    setLogger(previousLogger);
});

describe('createNumericConfig', () => {
    it('should fill in defaults', () => {
        expect(createNumericConfig()).toEqual({ bins: 1000, step: 1e-8 });
        expect(createNumericConfig({ bins: 50 })).toEqual({ bins: 50, step: DEFAULT_STEP });
    });
});

describe('validateNumericConfig', () => {
    it('should accept the defaults without warnings', () => {
        expect(validateNumericConfig(createNumericConfig())).toEqual({
            valid: true,
            errors: [],
            warnings: [],
        });
    });

    it('should collect every error', () => {
        const result = validateNumericConfig({ bins: 0, step: -1 });
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual([
            'bins must be a positive integer',
            'step must not be negative',
        ]);
    });

    it('should reject fractional bins and a NaN step', () => {
        expect(validateNumericConfig({ bins: 2.5, step: 1 }).errors).toEqual(['bins must be a positive integer']);
        expect(validateNumericConfig({ bins: 1, step: Number.NaN }).errors).toEqual(['step must be a number']);
    });

    it('should warn about a zero step', () => {
        const result = validateNumericConfig({ bins: 10, step: 0 });
        expect(result.valid).toBe(true);
        expect(result.warnings).toEqual(['step is 0: derivatives will divide by zero']);
    });

    it('should warn about a huge bin count', () => {
        const result = validateNumericConfig({ bins: 2e7, step: 1e-8 });
        expect(result.warnings).toHaveLength(1);
        expect(result.warnings[0]).toMatch(/^bins=20000000 is large/);
    });
});

describe('serialization', () => {
    it('should serialize to indented JSON', () => {
        expect(serializeNumericConfig({ bins: 10, step: 0.5 })).toBe('{\n  "bins": 10,\n  "step": 0.5\n}');
    });

    it('should read back what it wrote', () => {
        const config = { bins: 64, step: 1e-6 };
        expect(deserializeNumericConfig(serializeNumericConfig(config))).toEqual(config);
    });

    it('should default missing keys', () => {
        expect(deserializeNumericConfig('{"bins": 5}')).toEqual({ bins: 5, step: DEFAULT_STEP });
        expect(deserializeNumericConfig('{}')).toEqual({ bins: DEFAULT_BINS, step: DEFAULT_STEP });
    });

    it('should reject a non-object', () => {
        expect(() => deserializeNumericConfig('[]')).toThrow(InvalidParamError);
        expect(() => deserializeNumericConfig('null')).toThrow('Numeric config must be a JSON object');
    });

    it('should reject invalid fields', () => {
        expect(() => deserializeNumericConfig('{"bins": -2}')).toThrow(
            'Invalid numeric config: bins must be a positive integer'
        );
        expect(() => deserializeNumericConfig('{"step": "small"}')).toThrow(
            'Invalid numeric config: step must be a number'
        );
    });
});

describe('Settings', () => {
    it('should start at the defaults', () => {
        expect(settings.snapshot()).toEqual({ bins: DEFAULT_BINS, step: DEFAULT_STEP });
    });

    it('should reject a NaN step with status 102', () => {
        const outcome = settings.setStep(Number.NaN);
        expect(outcome.kind === 'failed' && outcome.error).toBeInstanceOf(InvalidParamError);
        expect(getStatus()).toBe(102);
        expect(settings.step).toBe(DEFAULT_STEP);
    });

    it('should accept a zero step', () => {
        expect(settings.setStep(0)).toEqual({ kind: 'ok', value: 0 });
        expect(settings.step).toBe(0);
    });

    it('should apply a valid config and log both keys', () => {
        const outcome = settings.apply({ bins: 20, step: 1e-3 });
        expect(outcome).toEqual({ kind: 'ok', value: { bins: 20, step: 1e-3 } });
        expect(getStatus()).toBe(0);
        expect(logger.configChanges.map(e => [e.key, e.previous, e.requested])).toEqual([
            ['bins', DEFAULT_BINS, 20],
            ['step', DEFAULT_STEP, 1e-3],
        ]);
    });

    it('should apply nothing when a field is invalid', () => {
        const outcome = settings.apply({ bins: 0, step: -1 });
        expect(outcome.kind === 'failed' && outcome.error).toBeInstanceOf(NegativeStepError);
        expect(getStatus()).toBe(601);
        expect(settings.snapshot()).toEqual({ bins: DEFAULT_BINS, step: DEFAULT_STEP });
        expect(logger.configChanges).toHaveLength(0);
    });

    it('should report invalid bins in apply with status 102', () => {
        const outcome = settings.apply({ bins: 0, step: 1 });
        expect(outcome.kind).toBe('failed');
        if (outcome.kind === 'failed') {
            expect(outcome.error.message).toBe('bins must be a positive integer');
        }
        expect(getStatus()).toBe(102);
        expect(settings.step).toBe(DEFAULT_STEP);
    });

    it('should reset values without touching the status', () => {
        settings.setBins(3);
        settings.setStep(-1);
        settings.reset();
        expect(settings.bins).toBe(DEFAULT_BINS);
        expect(getStatus()).toBe(601);
    });
});
