/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error' or '*:error', '*:failed' -> error
 * - '*:warning', '*-invalid', '*:invalid', '*:deprecated' -> warn
 * - '*:start', '*:complete', '*:created', etc. -> info
 * - Everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Patterns that classify an event as error level.
 */
const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/];

/**
 * Patterns that classify an event as warn level.
 */
const WARN_PATTERNS = [/:warning$/, /[-:]invalid$/, /:deprecated$/];

/**
 * Patterns that classify an event as info level.
 * These are significant lifecycle events worth logging at info verbosity.
 */
const INFO_PATTERNS = [
    /:start$/,
    /:complete$/,
    /:created$/,
    /:dropped$/,
    /:cleaned$/,
    /:loaded$/,
    /:persisted$/,
    /:saved$/,
    /:defaulted$/,
    /:disabled$/,
    /:skipped$/,
    /:triggered$/,
    /:installed$/,
    /:uninstalled$/,
    /:started$/,
];

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('error')                  // 'error'
 * classifyEvent('db:error')               // 'error'
 * classifyEvent('branch:filter-invalid')  // 'warn'
 * classifyEvent('switch:start')           // 'info'
 * classifyEvent('db:auth')                // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    if (ERROR_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'error';

    }

    if (WARN_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'warn';

    }

    if (INFO_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'info';

    }

    return 'debug';

}

/**
 * Map entry level to priority for comparison.
 * Lower priority = more severe.
 */
export function getEntryLevelPriority(level: EntryLevel): number {

    switch (level) {

    case 'error':
        return 1;
    case 'warn':
        return 2;
    case 'info':
        return 3;
    case 'debug':
        return 4;

    }

}

/**
 * Check if an entry level passes the configured verbosity.
 *
 * @example
 * ```typescript
 * shouldLogLevel('warn', 'info')   // true
 * shouldLogLevel('debug', 'info')  // false
 * ```
 */
export function shouldLogLevel(level: EntryLevel, configLevel: LogLevel): boolean {

    return getEntryLevelPriority(level) <= LOG_LEVEL_PRIORITY[configLevel];

}

/**
 * Check if an event should be logged at the given verbosity level.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')           // true (errors always logged)
 * shouldLog('switch:start', 'info')    // true (info event at info level)
 * shouldLog('db:auth', 'info')         // false (debug event at info level)
 * shouldLog('db:auth', 'verbose')      // true (everything at verbose)
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    if (configLevel === 'silent') {

        return false;

    }

    if (configLevel === 'verbose') {

        return true;

    }

    return shouldLogLevel(classifyEvent(event), configLevel);

}
