/**
 * Logger Types
 *
 * Type definitions for the pgbranch logging system.
 * The logger captures observer events and writes them as lines
 * to a console stream (and optionally a file stream).
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings (default)
 * - info: Errors + warnings + info
 * - verbose: All events including debug
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Entry level of a single line.
 * Maps to standard logging conventions.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * A single log entry, written as one JSON line in json mode.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "event": "db:created",
 *     "message": "Created database pgbranch_feature_auth (42ms)"
 * }
 * ```
 */
export interface LogEntry {
    timestamp: string;
    level: EntryLevel;
    event: string;
    message: string;
    data?: Record<string, unknown>;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
    /** Minimum level to write */
    level: LogLevel;

    /** Write JSON entries instead of text lines */
    json: boolean;

    /** Prefix lines with an ISO timestamp */
    timestamps: boolean;
}

/**
 * Default logger configuration.
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    level: 'warn',
    json: false,
    timestamps: false,
};

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'idle' | 'running' | 'stopped';
