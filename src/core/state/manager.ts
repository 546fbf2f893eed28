/**
 * LocalStateStore - per-checkout branch state.
 *
 * Reads and writes `~/.config/pgbranch/local_state.json`. Every write goes
 * straight to disk. Concurrent processes are not coordinated; the last
 * writer wins.
 */
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { homedir } from 'os'
import { dirname, join, resolve } from 'path'
import { attemptSync } from '@logosdx/utils'
import { observer } from '../observer.js'
import type { LocalState } from './types.js'
import { LocalStateSchema, createEmptyState } from './types.js'


const DEFAULT_STATE_FILE = 'local_state.json'


/**
 * Default directory of the state file.
 */
export function getDefaultStateDir(): string {

    return join(homedir(), '.config', 'pgbranch')
}


/**
 * Error thrown when the state file cannot be read or written.
 */
export class LocalStateError extends Error {

    constructor(
        message: string,
        public readonly path: string,
        cause?: Error,
    ) {

        super(message, { cause })
        this.name = 'LocalStateError'
    }
}


/**
 * Options for LocalStateStore constructor.
 */
export interface LocalStateStoreOptions {

    /** State directory (defaults to ~/.config/pgbranch) */
    stateDir?: string

    /** State filename (defaults to 'local_state.json') */
    stateFile?: string
}


/**
 * Per-config-path branch state.
 *
 * @example
 * ```typescript
 * const store = new LocalStateStore()
 *
 * store.setCurrentBranch('/home/dev/app/.pgbranch.yml', 'feature_login')
 * store.getCurrentBranch('/home/dev/app/.pgbranch.yml')  // 'feature_login'
 * ```
 *
 * @example
 * ```typescript
 * // For testing with a throw-away directory
 * const store = new LocalStateStore({ stateDir: tmpDir })
 * ```
 */
export class LocalStateStore {

    readonly statePath: string

    constructor(options: LocalStateStoreOptions = {}) {

        const stateDir = options.stateDir ?? getDefaultStateDir()
        const stateFile = options.stateFile ?? DEFAULT_STATE_FILE
        this.statePath = join(stateDir, stateFile)
    }

    /**
     * Read the state file. A missing file is an empty state.
     *
     * @throws LocalStateError if the file is unreadable or corrupt
     */
    load(): LocalState {

        if (!existsSync(this.statePath)) {

            return createEmptyState()
        }

        const [raw, readErr] = attemptSync(() => readFileSync(this.statePath, 'utf8'))

        if (readErr) {

            observer.emit('error', { source: 'state', error: readErr })
            throw new LocalStateError(`Failed to read local state ${this.statePath}: ${readErr.message}`, this.statePath, readErr)
        }

        const [parsed, parseErr] = attemptSync((): unknown => JSON.parse(raw))

        if (parseErr) {

            observer.emit('error', { source: 'state', error: parseErr })
            throw new LocalStateError(`Local state file ${this.statePath} is corrupted: ${parseErr.message}`, this.statePath, parseErr)
        }

        const result = LocalStateSchema.safeParse(parsed)

        if (!result.success) {

            throw new LocalStateError(`Local state file ${this.statePath} has an unexpected layout`, this.statePath, result.error)
        }

        observer.emit('state:loaded', {
            path: this.statePath,
            entries: Object.keys(result.data.repositories).length,
        })

        return result.data
    }

    /**
     * Logical branch recorded for a config file.
     *
     * No record, `null` and `""` all answer null.
     *
     * @throws LocalStateError if the file is unreadable or corrupt
     */
    getCurrentBranch(configPath: string): string | null {

        const state = this.load()
        const entry = state.repositories[resolve(configPath)]

        return entry?.current_branch || null
    }

    /**
     * Record the logical branch for a config file.
     *
     * @throws LocalStateError if the file cannot be written
     */
    setCurrentBranch(configPath: string, branch: string | null): void {

        const key = resolve(configPath)
        const state = this.load()

        state.repositories[key] = {
            current_branch: branch || null,
            updated_at: new Date().toISOString(),
        }

        this.#persist(state)

        observer.emit('state:persisted', {
            path: this.statePath,
            configPath: key,
            branch: branch || null,
        })
    }

    /**
     * Forget the record of a config file.
     *
     * @throws LocalStateError if the file cannot be written
     */
    clear(configPath: string): void {

        const key = resolve(configPath)
        const state = this.load()

        if (!(key in state.repositories)) return

        delete state.repositories[key]
        this.#persist(state)
    }

    #persist(state: LocalState): void {

        const dir = dirname(this.statePath)

        const [, mkdirErr] = attemptSync(() => mkdirSync(dir, { recursive: true }))

        if (mkdirErr) {

            observer.emit('error', { source: 'state', error: mkdirErr })
            throw new LocalStateError(`Failed to create ${dir}: ${mkdirErr.message}`, this.statePath, mkdirErr)
        }

        const [, writeErr] = attemptSync(() =>
            writeFileSync(this.statePath, JSON.stringify(state, null, 2) + '\n')
        )

        if (writeErr) {

            observer.emit('error', { source: 'state', error: writeErr })
            throw new LocalStateError(`Failed to write local state ${this.statePath}: ${writeErr.message}`, this.statePath, writeErr)
        }
    }
}
