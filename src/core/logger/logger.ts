/**
 * Logger
 *
 * Stream-based logger that subscribes to every observer event and writes
 * classified, redacted lines. The CLI points it at stderr so command
 * output on stdout stays clean.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ config: { level: 'info' }, console: process.stderr })
 * logger.start()
 *
 * // Logger now captures observer events
 * observer.emit('db:created', { database: 'pgbranch_feature', durationMs: 12 })
 *
 * logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';

import { observer } from '../observer.js';
import { classifyEvent, shouldLog, shouldLogLevel } from './classifier.js';
import { generateMessage, serializeEntry, formatEntry } from './formatter.js';
import { filterData } from './redact.js';
import type { LogLevel, LoggerConfig, LoggerState, EntryLevel } from './types.js';
import { DEFAULT_LOGGER_CONFIG } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {

    /** Logger configuration */
    config?: Partial<LoggerConfig>;

    /** Console stream to write to (defaults to stderr) */
    console?: Writable;

    /** Optional second stream, e.g. a file opened by the caller */
    file?: Writable;
}

/**
 * Logger that captures observer events and writes to streams.
 */
export class Logger {

    #config: LoggerConfig;
    #console: Writable;
    #file: Writable | null;
    #state: LoggerState = 'idle';
    #cleanup: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#console = options.console ?? process.stderr;
        this.#file = options.file ?? null;

    }

    /**
     * Current lifecycle state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Current log level.
     */
    get level(): LogLevel {

        return this.#config.level;

    }

    /**
     * Whether anything will be written at all.
     */
    get isEnabled(): boolean {

        return this.#config.level !== 'silent';

    }

    /**
     * Start capturing observer events.
     */
    start(): void {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        this.#cleanup = observer.on(/./, ({ event, data }) => {

            this.#handleEvent(String(event), toRecord(data));

        });

        this.#state = 'running';

        observer.emit('logger:started', { level: this.#config.level });

    }

    /**
     * Stop capturing events.
     */
    stop(): void {

        if (this.#state !== 'running') {

            return;

        }

        if (this.#cleanup) {

            this.#cleanup();
            this.#cleanup = null;

        }

        this.#state = 'stopped';

    }

    /**
     * Handle an observer event.
     */
    #handleEvent(event: string, data: Record<string, unknown>): void {

        if (!shouldLog(event, this.#config.level)) {

            return;

        }

        const filteredData = filterData(data, this.#config.level);

        if (this.#config.json) {

            const entry = formatEntry(event, filteredData, this.#config.level === 'verbose');
            this.#write(serializeEntry(entry));

            return;

        }

        this.#writeLine(classifyEvent(event), generateMessage(event, filteredData), filteredData);

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    /**
     * Internal log method for direct messages.
     */
    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (!this.isEnabled || !shouldLogLevel(level, this.#config.level)) {

            return;

        }

        const filteredData = data ? filterData(data, this.#config.level) : {};

        if (this.#config.json) {

            const entry = {
                timestamp: new Date().toISOString(),
                level,
                event: 'log',
                message,
                ...(Object.keys(filteredData).length > 0 ? { data: filteredData } : {}),
            };
            this.#write(serializeEntry(entry));

            return;

        }

        this.#writeLine(level, message, filteredData);

    }

    /**
     * Write a text line: `[LEVEL] message`, data appended in verbose mode.
     */
    #writeLine(level: EntryLevel, message: string, data: Record<string, unknown>): void {

        const levelLabel = level.toUpperCase().padEnd(5);
        let line = `[${levelLabel}] ${message}`;

        if (this.#config.timestamps) {

            line = `[${new Date().toISOString()}] ${line}`;

        }

        if (this.#config.level === 'verbose' && Object.keys(data).length > 0) {

            line += ` ${JSON.stringify(data, jsonReplacer)}`;

        }

        this.#write(line + '\n');

    }

    #write(line: string): void {

        this.#console.write(line);

        if (this.#file) {

            this.#file.write(line);

        }

    }

}

function toRecord(data: unknown): Record<string, unknown> {

    if (typeof data === 'object' && data !== null && !Array.isArray(data)) {

        return { ...data };

    }

    return data === undefined ? {} : { value: data };

}

function jsonReplacer(_key: string, value: unknown): unknown {

    return value instanceof Error ? value.message : value;

}

// ─────────────────────────────────────────────────────────────
// Singleton / Factory
// ─────────────────────────────────────────────────────────────

let loggerInstance: Logger | null = null;

/**
 * Get or create the shared Logger instance.
 */
export function getLogger(options?: LoggerOptions): Logger {

    if (!loggerInstance) {

        loggerInstance = new Logger(options);

    }

    return loggerInstance;

}

/**
 * Reset the logger singleton.
 *
 * Useful for testing to ensure clean state between tests.
 */
export function resetLogger(): void {

    if (loggerInstance) {

        loggerInstance.stop();
        loggerInstance = null;

    }

}
