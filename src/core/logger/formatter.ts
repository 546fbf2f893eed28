/**
 * Log Formatter
 *
 * Converts observer events into human-readable messages and LogEntry
 * objects. Each entry is written as a single line.
 */
import type { LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


function joinList(value: unknown): string {

    return Array.isArray(value) ? value.map(String).join(', ') : ''
}


/**
 * Human-readable message templates for known events.
 * Keys are event names, values build the message from event data.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Config
    'config:loaded': (d) => `Loaded ${d['source']} config from ${d['path']}`,
    'config:defaulted': (d) => `No .pgbranch file found from ${d['cwd']}, using default configuration`,
    'config:deprecated': (d) => `Ignoring deprecated field "${d['field']}" in ${d['path']}; branch state is kept in local state now`,
    'config:saved': (d) => `Saved config to ${d['path']}`,

    // Env
    'env:loaded': (d) => `Environment overrides: ${joinList(d['variables']) || 'none'}`,

    // Branch decisions
    'branch:pattern-invalid': (d) => `Invalid disabled-branch pattern "${d['pattern']}": ${d['error']}`,
    'branch:filter-invalid': (d) => `Invalid regex filter "${d['filter']}": ${d['error']}`,
    'branch:disabled': (d) => `pgbranch disabled for ${d['branch']} (${d['source']})`,
    'branch:skipped': (d) => d['reason'] === 'not-creatable'
        ? `Git branch ${d['branch']} configured not to create PostgreSQL branch`
        : `Git branch ${d['branch']} skipped (${d['reason']})`,

    // State
    'state:loaded': (d) => `Local state loaded from ${d['path']} (${d['entries']} entries)`,
    'state:persisted': (d) => `Current branch for ${d['configPath']} set to ${d['branch'] ?? 'none'}`,

    // Git
    'git:unavailable': (d) => `Could not access Git repository at ${d['cwd']}: ${d['error']}`,

    // Hooks
    'hook:triggered': (d) => `Git hook triggered for branch: ${d['branch']}`,
    'hook:installed': (d) => `Installed ${joinList(d['hooks'])} in ${d['hooksDir']}`,
    'hook:uninstalled': (d) => `Removed ${joinList(d['hooks']) || 'no hooks'} from ${d['hooksDir']}`,

    // Switching
    'switch:start': (d) => `Switching to ${d['branch']} (${d['database']})`,
    'switch:complete': (d) => `Switched to ${d['branch']} (${d['database']})`,
    'switch:warning': (d) => `${d['branch']}: ${d['message']}`,

    // DB
    'db:auth': (d) => `Using ${d['method']} authentication`,
    'db:creating': (d) => `Creating database ${d['database']} from template ${d['template']}`,
    'db:created': (d) => `Created database ${d['database']} (${d['durationMs']}ms)`,
    'db:exists': (d) => `Database ${d['database']} already exists, skipping creation`,
    'db:dropping': (d) => `Dropping database ${d['database']}`,
    'db:dropped': (d) => `Dropped database ${d['database']}`,
    'db:missing': (d) => `Database ${d['database']} does not exist, skipping deletion`,
    'db:cleaned': (d) => `Cleanup kept ${d['kept']} branches, dropped ${Array.isArray(d['dropped']) ? d['dropped'].length : 0}`,
    'db:error': (d) => `Database error for ${d['database']}: ${d['error']}`,

    // Post commands
    'post-command:start': (d) => `Running post-command ${d['index']}/${d['total']}: ${d['name']}`,
    'post-command:complete': (d) => `Finished ${d['name']} (${d['durationMs']}ms)`,
    'post-command:skipped': (d) => `Skipped ${d['name']} (${d['reason']})`,
    'post-command:failed': (d) => d['continued']
        ? `Post-command ${d['name']} failed, continuing: ${d['error']}`
        : `Post-command ${d['name']} failed: ${d['error']}`,

    // Docker compose
    'compose:detected': (d) => `Found PostgreSQL service "${d['service']}" in ${d['path']}`,
    'compose:invalid': (d) => `Skipping unreadable compose file ${d['path']}: ${d['error']}`,

    // Logger
    'logger:started': (d) => `Logger started at ${d['level']} level`,

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${d['error'] instanceof Error ? d['error'].message : String(d['error'])}`,
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to a generic format.
 *
 * @example
 * ```typescript
 * generateMessage('db:dropped', { database: 'pgbranch_x' })
 * // 'Dropped database pgbranch_x'
 *
 * generateMessage('custom:thing', { a: 1 })
 * // 'custom thing: a=1'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and collapses objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        if (value.length > 50) {

            return `"${value.slice(0, 47)}..."`
        }

        return `"${value}"`
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (value instanceof Error) {

        return value.message
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Format an event into a LogEntry.
 *
 * @param includeData - Whether to include the full payload (verbose mode)
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    includeData = false
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = serializableData(data)
    }

    return entry
}


/**
 * Make payload values JSON-safe (errors and dates flattened).
 */
function serializableData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = { name: value.name, message: value.message }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        result[key] = value
    }

    return result
}


/**
 * Serialize a LogEntry to a JSON line.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}
