/**
 * Logger Module
 *
 * Captures observer events and writes them to log streams.
 *
 * Features:
 * - Event classification by name
 * - Redaction of password-like fields
 * - Text or JSON lines
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LOG_LEVEL_PRIORITY, DEFAULT_LOGGER_CONFIG } from './types.js';

// Classifier
export { classifyEvent, shouldLog, shouldLogLevel } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, serializeEntry } from './formatter.js';

// Redaction
export {
    addMaskedFields,
    isMaskedField,
    maskValue,
    filterData,
} from './redact.js';

// Logger
export { Logger, getLogger, resetLogger, type LoggerOptions } from './logger.js';
