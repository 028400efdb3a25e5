/**
 * Logging Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
    getLogger,
    setLogger,
} from '../src/core/logging';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('ConsoleLogger', () => {
    it('should print failures to console.warn at the default level', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const logger = new ConsoleLogger();

        logger.logOperation({ operation: 'gcd', status: 0 });
        logger.logOperation({ operation: 'gcd', status: 201, message: 'gcd(0, 0) is undefined' });

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith('[OP] gcd: status=201 (gcd(0, 0) is undefined)');
    });

    it('should print successes at debug level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        new ConsoleLogger('debug').logOperation({ operation: 'polyEvaluate', status: 0 });
        expect(log).toHaveBeenCalledWith('[OP] polyEvaluate: status=0');
    });

    it('should print accepted config changes at info level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const logger = new ConsoleLogger({ level: 'info' });
        logger.logConfig({ key: 'bins', previous: 1000, requested: 10, status: 0 });
        expect(log).toHaveBeenCalledWith('[CONFIG] bins: 1000 -> 10, status=0');
    });

    it('should stay silent below its level', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const logger = new ConsoleLogger('error');
        logger.logConfig({ key: 'step', previous: 1e-8, requested: -1, status: 601 });
        logger.logOperation({ operation: 'factorial', status: 501 });
        expect(warn).not.toHaveBeenCalled();
    });
});

describe('MemoryLogger', () => {
    it('should stamp entries with schema version and source', () => {
        const logger = new MemoryLogger();
        logger.logOperation({ operation: 'lcm', status: 0 });

        expect(logger.operations).toHaveLength(1);
        expect(logger.operations[0]).toMatchObject({
            schemaVersion: '1.0.0',
            source: 'numerix',
            logType: 'operation',
            operation: 'lcm',
            status: 0,
        });
        expect(typeof logger.operations[0].timestamp).toBe('number');
    });

    it('should export one JSON line per entry, operations first', () => {
        const logger = new MemoryLogger({ source: 'unit' });
        logger.logConfig({ key: 'bins', previous: 1000, requested: 0, status: 102 });
        logger.logOperation({ operation: 'makeRange', status: 506 });

        const lines = logger.toJSONL().split('\n').map(line => JSON.parse(line));
        expect(lines.map(entry => entry.logType)).toEqual(['operation', 'config']);
        expect(lines[1].source).toBe('unit');
    });

    it('should export both lists as JSON', () => {
        const logger = new MemoryLogger();
        logger.logOperation({ operation: 'factorial', status: 501 });
        const parsed = JSON.parse(logger.toJSON());
        expect(parsed.operations).toHaveLength(1);
        expect(parsed.configChanges).toEqual([]);
    });

    it('should clear all entries', () => {
        const logger = new MemoryLogger();
        logger.logOperation({ operation: 'gcd', status: 0 });
        logger.logConfig({ key: 'step', previous: 1, requested: 2, status: 0 });
        logger.clear();
        expect(logger.getAllLogs()).toEqual([]);
    });
});

describe('MultiLogger', () => {
    it('should forward entries to every logger', () => {
        const a = new MemoryLogger();
        const b = new MemoryLogger();
        const multi = new MultiLogger([a, b]);

        multi.logOperation({ operation: 'binomial', status: 102 });
        multi.logConfig({ key: 'bins', previous: 1, requested: 2, status: 0 });
        multi.flush();
        multi.close();

        expect(a.getAllLogs()).toHaveLength(2);
        expect(b.getAllLogs()).toHaveLength(2);
    });
});

describe('createLogger', () => {
    it('should build the requested kind', () => {
        expect(createLogger('memory')).toBeInstanceOf(MemoryLogger);
        expect(createLogger('console', { level: 'debug' })).toBeInstanceOf(ConsoleLogger);
    });
});

describe('active logger', () => {
    it('should default to a console logger', () => {
        expect(getLogger()).toBeInstanceOf(ConsoleLogger);
    });

    it('should swap and return the previous logger', () => {
        const memory = new MemoryLogger();
        const previous = setLogger(memory);
        expect(getLogger()).toBe(memory);
        expect(setLogger(previous)).toBe(memory);
        expect(getLogger()).toBe(previous);
    });
});
