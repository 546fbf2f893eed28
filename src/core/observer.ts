/**
 * Central event system for pgbranch.
 *
 * Core modules emit events, the CLI and logger subscribe. Core code never
 * prints, so every warning or fallback decision surfaces here.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('db:creating', { database, template })
 *
 * // In CLI - subscribe to events
 * const cleanup = observer.on('db:created', (data) => report(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^post-command:/, ({ event, data }) => logStep(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'


/**
 * All events emitted by pgbranch core modules.
 *
 * Events are namespaced by module:
 * - `config:*` - Config file discovery and loading
 * - `env:*` - Environment overlay
 * - `branch:*` - Naming and classification decisions
 * - `state:*` - Local state load/persist
 * - `git:*` - Git accessor
 * - `hook:*` - Git hook lifecycle
 * - `switch:*` - Branch switching
 * - `db:*` - Database lifecycle
 * - `post-command:*` - Post command execution
 * - `error` - Catch-all errors
 */
export interface PgbranchEvents {

    // Config
    'config:loaded': { path: string; source: 'base' | 'local' }
    'config:defaulted': { cwd: string }
    'config:deprecated': { path: string; field: string }
    'config:saved': { path: string }

    // Environment overlay
    'env:loaded': { variables: string[] }

    // Branch decisions
    'branch:pattern-invalid': { pattern: string; error: string }
    'branch:filter-invalid': { filter: string; error: string }
    'branch:disabled': { branch: string; source: 'global' | 'current-branch' | 'pattern' }
    'branch:skipped': { branch: string; reason: 'filtered' | 'not-creatable' | 'hooks-skipped' }

    // Local state
    'state:loaded': { path: string; entries: number }
    'state:persisted': { path: string; configPath: string; branch: string | null }

    // Git
    'git:unavailable': { cwd: string; error: string }

    // Hooks
    'hook:triggered': { branch: string }
    'hook:installed': { hooksDir: string; hooks: string[] }
    'hook:uninstalled': { hooksDir: string; hooks: string[] }

    // Switching
    'switch:start': { branch: string; database: string }
    'switch:complete': { branch: string; database: string }
    'switch:warning': { branch: string; message: string }

    // DB lifecycle
    'db:auth': { method: string }
    'db:creating': { database: string; template: string }
    'db:created': { database: string; durationMs: number }
    'db:exists': { database: string }
    'db:dropping': { database: string }
    'db:dropped': { database: string }
    'db:missing': { database: string }
    'db:cleaned': { kept: number; dropped: string[] }
    'db:error': { database: string; error: string }

    // Post commands
    'post-command:start': { name: string; index: number; total: number }
    'post-command:complete': { name: string; durationMs: number }
    'post-command:skipped': { name: string; reason: string }
    'post-command:failed': { name: string; error: string; continued: boolean }

    // Docker compose
    'compose:detected': { path: string; service: string }
    'compose:invalid': { path: string; error: string }

    // Logger
    'logger:started': { level: string }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type PgbranchEventNames = Events<PgbranchEvents>;
export type PgbranchEventCallback<E extends PgbranchEventNames> = ObserverEngine.EventCallback<PgbranchEvents[E]>

/**
 * Global observer instance for pgbranch.
 *
 * Enable spy mode with `PGBRANCH_DEBUG=true` to see all events as they occur.
 */
export const observer = new ObserverEngine<PgbranchEvents>({
    name: 'pgbranch',
    spy: process.env['PGBRANCH_DEBUG'] === 'true'
        ? (action) => console.error(`[pgbranch:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
