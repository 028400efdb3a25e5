/**
 * @module core/logging
 * @description Structured logging of routine outcomes and configuration changes
 *
 * Entries carry a fixed, versioned field schema. ConsoleLogger filters by
 * level, MemoryLogger keeps entries for inspection (tests, notebooks).
 */

import type { StatusCode } from './status';

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Source label (library or caller-chosen) */
    source: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Outcome of a single routine call
 */
export interface OperationLogEntry extends BaseLogEntry {
    logType: 'operation';
    operation: string;
    status: StatusCode;
    message?: string;
    details?: Record<string, unknown>;
}

/**
 * Change (or rejected change) of a process-wide tunable
 */
export interface ConfigLogEntry extends BaseLogEntry {
    logType: 'config';
    key: 'bins' | 'step';
    previous: number;
    requested: number;
    status: StatusCode;
}

/**
 * Union of all log entry types
 */
export type LogEntry = OperationLogEntry | ConfigLogEntry;

type EntryInput<E extends LogEntry> = Omit<E, 'logType' | 'schemaVersion' | 'source' | 'timestamp'>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log a routine outcome */
    logOperation(entry: EntryInput<OperationLogEntry>): void;
    /** Log a tunable change */
    logConfig(entry: EntryInput<ConfigLogEntry>): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Source label written into every entry */
    source?: string;
    /** Minimum level printed by ConsoleLogger */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';
const DEFAULT_SOURCE = 'numerix';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/** OK outcomes log at debug, anything else at warn */
function levelForStatus(status: StatusCode): LogLevel {
    return status === 0 ? 'debug' : 'warn';
}

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'warn') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
        } else {
            this.level = levelOrConfig.level ?? 'warn';
        }
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    logOperation(entry: EntryInput<OperationLogEntry>): void {
        const level = levelForStatus(entry.status);
        if (!this.enabled(level)) return;

        const line = `[OP] ${entry.operation}: status=${entry.status}` +
            (entry.message ? ` (${entry.message})` : '');
        if (level === 'warn') {
            console.warn(line);
        } else {
            console.log(line);
        }
    }

    logConfig(entry: EntryInput<ConfigLogEntry>): void {
        const level: LogLevel = entry.status === 0 ? 'info' : 'warn';
        if (!this.enabled(level)) return;

        const line = `[CONFIG] ${entry.key}: ${entry.previous} -> ${entry.requested}, status=${entry.status}`;
        if (level === 'warn') {
            console.warn(line);
        } else {
            console.log(line);
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory.
 * Useful for testing and for inspecting a sequence of calls afterwards.
 */
export class MemoryLogger implements Logger {
    private config: { source: string; schemaVersion: string };
    public operations: OperationLogEntry[] = [];
    public configChanges: ConfigLogEntry[] = [];

    constructor(config: LoggerConfig = {}) {
        this.config = {
            source: config.source ?? DEFAULT_SOURCE,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            source: this.config.source,
            timestamp: Date.now(),
        };
    }

    logOperation(entry: EntryInput<OperationLogEntry>): void {
        this.operations.push({
            ...this.createBaseEntry(),
            logType: 'operation',
            ...entry,
        });
    }

    logConfig(entry: EntryInput<ConfigLogEntry>): void {
        this.configChanges.push({
            ...this.createBaseEntry(),
            logType: 'config',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.operations, ...this.configChanges];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            operations: this.operations,
            configChanges: this.configChanges,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.operations = [];
        this.configChanges = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logOperation(entry: EntryInput<OperationLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logOperation(entry);
        }
    }

    logConfig(entry: EntryInput<ConfigLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logConfig(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig = {}
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}

// ==================== Active Logger ====================

let activeLogger: Logger = new ConsoleLogger('warn');

export function getLogger(): Logger {
    return activeLogger;
}

/**
 * Replace the process-wide logger; returns the previous one
 */
export function setLogger(logger: Logger): Logger {
    const previous = activeLogger;
    activeLogger = logger;
    return previous;
}
