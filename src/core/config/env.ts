/**
 * Environment variable overlay.
 *
 * A fixed set of PGBRANCH_* variables overrides the config files.
 * Booleans are strict: an unrecognised spelling is a user error. The
 * port is permissive and simply ignored when it does not parse.
 *
 * @example
 * ```bash
 * # Skip pgbranch for one command
 * PGBRANCH_DISABLED=true git checkout feature/x
 *
 * # Point at a CI database
 * PGBRANCH_DATABASE_HOST=ci-db
 * PGBRANCH_DATABASE_PORT=5433
 * PGBRANCH_DISABLED_BRANCHES="release/*, hotfix-*"
 * ```
 */
import { observer } from '../observer.js'
import type { EnvOverlay } from './types.js'


/**
 * Recognised variables, keyed by overlay field.
 */
export const ENV_VARIABLES = {
    disabled: 'PGBRANCH_DISABLED',
    skip_hooks: 'PGBRANCH_SKIP_HOOKS',
    auto_create: 'PGBRANCH_AUTO_CREATE',
    auto_switch: 'PGBRANCH_AUTO_SWITCH',
    current_branch_disabled: 'PGBRANCH_CURRENT_BRANCH_DISABLED',
    branch_filter_regex: 'PGBRANCH_BRANCH_FILTER_REGEX',
    database_host: 'PGBRANCH_DATABASE_HOST',
    database_user: 'PGBRANCH_DATABASE_USER',
    database_password: 'PGBRANCH_DATABASE_PASSWORD',
    database_prefix: 'PGBRANCH_DATABASE_PREFIX',
    database_port: 'PGBRANCH_DATABASE_PORT',
    disabled_branches: 'PGBRANCH_DISABLED_BRANCHES',
} as const satisfies Record<keyof EnvOverlay, string>


const TRUE_VALUES = new Set(['true', '1', 'yes', 'on'])
const FALSE_VALUES = new Set(['false', '0', 'no', 'off'])

const BOOLEAN_FIELDS = [
    'disabled',
    'skip_hooks',
    'auto_create',
    'auto_switch',
    'current_branch_disabled',
] as const

const STRING_FIELDS = [
    'branch_filter_regex',
    'database_host',
    'database_user',
    'database_password',
    'database_prefix',
] as const


/**
 * Error thrown when a boolean variable holds an unrecognised value.
 */
export class EnvParseError extends Error {

    constructor(
        public readonly variable: string,
        public readonly value: string,
    ) {

        super(`Invalid boolean value for ${variable}: "${value}" (expected true/false, 1/0, yes/no or on/off)`)
        this.name = 'EnvParseError'
    }
}


/**
 * Parse a boolean variable.
 *
 * Case-insensitive, surrounding whitespace ignored.
 *
 * @throws EnvParseError for any other spelling
 *
 * @example
 * ```typescript
 * parseBooleanEnv('PGBRANCH_DISABLED', 'Yes')    // true
 * parseBooleanEnv('PGBRANCH_DISABLED', 'off')    // false
 * parseBooleanEnv('PGBRANCH_DISABLED', 'maybe')  // throws EnvParseError
 * ```
 */
export function parseBooleanEnv(variable: string, value: string): boolean {

    const normalized = value.trim().toLowerCase()

    if (TRUE_VALUES.has(normalized)) return true
    if (FALSE_VALUES.has(normalized)) return false

    throw new EnvParseError(variable, value)
}


/**
 * Parse a port. Anything but a decimal integer in 1..65535 is absent.
 */
export function parsePortEnv(value: string): number | undefined {

    const trimmed = value.trim()

    if (!/^\d+$/.test(trimmed)) return undefined

    const port = Number(trimmed)

    return port >= 1 && port <= 65535 ? port : undefined
}


/**
 * Split a comma-separated list, trimming entries and dropping empty ones.
 */
export function parseListEnv(value: string): string[] {

    return value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0)
}


/**
 * Read the environment overlay.
 *
 * Only variables that are set appear in the result.
 *
 * @throws EnvParseError if a boolean variable is malformed
 *
 * @example
 * ```typescript
 * const env = getEnvOverlay({ PGBRANCH_DATABASE_HOST: 'ci-host', PGBRANCH_AUTO_CREATE: 'no' })
 * // { database_host: 'ci-host', auto_create: false }
 * ```
 */
export function getEnvOverlay(env: NodeJS.ProcessEnv = process.env): EnvOverlay {

    const overlay: EnvOverlay = {}
    const seen: string[] = []

    for (const field of BOOLEAN_FIELDS) {

        const variable = ENV_VARIABLES[field]
        const value = env[variable]

        if (value === undefined) continue

        overlay[field] = parseBooleanEnv(variable, value)
        seen.push(variable)
    }

    for (const field of STRING_FIELDS) {

        const variable = ENV_VARIABLES[field]
        const value = env[variable]

        if (value === undefined) continue

        overlay[field] = value
        seen.push(variable)
    }

    const port = env[ENV_VARIABLES.database_port]

    if (port !== undefined) {

        const parsed = parsePortEnv(port)

        if (parsed !== undefined) {

            overlay.database_port = parsed
        }

        seen.push(ENV_VARIABLES.database_port)
    }

    const disabledBranches = env[ENV_VARIABLES.disabled_branches]

    if (disabledBranches !== undefined) {

        overlay.disabled_branches = parseListEnv(disabledBranches)
        seen.push(ENV_VARIABLES.disabled_branches)
    }

    if (seen.length > 0) {

        observer.emit('env:loaded', { variables: seen })
    }

    return overlay
}
