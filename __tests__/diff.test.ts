/**
 * Differentiation and Root-Finding Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createRange, derivativeAt, secantRoot } from '../src/models/numeric/calculus';
import { DEFAULT_STEP, settings } from '../src/core/config';
import { InvalidParamError, NegativeStepError } from '../src/core/errors';
import { setLogger, type Logger } from '../src/core/logging';
import { unwrap } from '../src/core/result';
import { getStatus } from '../src/core/status';
import { isolateGlobals } from './test-utils';

let previousLogger: Logger;

beforeEach(() => {
    previousLogger = isolateGlobals().previous;
});

afterEach(() => {
    settings.reset();
    setLogger(previousLogger);
});

// ==================== Forward Difference ====================

describe('derivativeAt', () => {
    it('should approximate the slope with the default step', () => {
        expect(settings.step).toBe(DEFAULT_STEP);
        expect(derivativeAt(x => x * x, 3)).toBeCloseTo(6, 5);
        expect(derivativeAt(Math.exp, 0)).toBeCloseTo(1, 6);
    });

    it('should use the configured step', () => {
        settings.setStep(0.5);
        // (1.5² - 1²) / 0.5
        expect(derivativeAt(x => x * x, 1)).toBe(2.5);
    });

    it('should divide by zero unguarded when the step is 0', () => {
        settings.setStep(0);
        expect(derivativeAt(x => x, 1)).toBeNaN();
    });
});

describe('settings.setStep', () => {
    it('should reject a negative step and keep the previous one', () => {
        settings.setStep(1e-6);
        const outcome = settings.setStep(-1);
        expect(outcome.kind).toBe('failed');
        if (outcome.kind === 'failed') {
            expect(outcome.error).toBeInstanceOf(NegativeStepError);
        }
        expect(getStatus()).toBe(601);
        expect(settings.step).toBe(1e-6);
    });

    it('should set status 0 on success', () => {
        settings.setStep(-1);
        settings.setStep(1e-4);
        expect(getStatus()).toBe(0);
        expect(settings.step).toBe(1e-4);
    });
});

// ==================== Secant Method ====================

describe('secantRoot', () => {
    const f = (x: number) => x * x - 612;

    it('should approximate √612 from [10, 30] in 5 iterations', () => {
        const root = unwrap(secantRoot(f, createRange(10, 30), 5));
        expect(root).toBeCloseTo(24.738633748750722, 12);
        expect(root).toBeCloseTo(Math.sqrt(612), 7);
    });

    it('should run exactly the requested number of iterations', () => {
        const root = unwrap(secantRoot(f, createRange(10, 30), 3));
        expect(root).toBeCloseTo(24.746543778801843, 12);
    });

    it('should solve a linear function in one step', () => {
        // 10 - 16 * (10 - 0) / (16 - (-4))
        expect(unwrap(secantRoot(x => 2 * x - 4, createRange(0, 10), 1))).toBe(2);
    });

    it('should produce NaN once the iterates coincide', () => {
        expect(unwrap(secantRoot(x => 2 * x - 4, createRange(0, 10), 3))).toBeNaN();
    });

    it('should fail with InvalidParamError for 0 iterations', () => {
        const outcome = secantRoot(f, createRange(10, 30), 0);
        expect(outcome.kind).toBe('failed');
        if (outcome.kind === 'failed') {
            expect(outcome.error).toBeInstanceOf(InvalidParamError);
            expect(outcome.error.status).toBe(102);
        }
    });
});
