/**
 * Checks on a resolved configuration.
 *
 * The schemas only check types. Emptiness and identifier rules are
 * checked here, after all layers are merged, so an override can fix a
 * bad base value.
 */
import { compilePattern } from './patterns.js'
import type { BaseConfig } from './types.js'


/**
 * A prefix must itself start a valid identifier.
 */
const PREFIX_PATTERN = /^[a-z_][a-z0-9_$]*$/


/**
 * A problem found in a resolved config.
 */
export interface ConfigProblem {

    field: string
    message: string
}


/**
 * List every problem with a resolved config. Empty means valid.
 *
 * @example
 * ```typescript
 * const problems = validateResolvedConfig(effective.merged())
 *
 * for (const { field, message } of problems) {
 *     console.error(`${field}: ${message}`)
 * }
 * ```
 */
export function validateResolvedConfig(config: BaseConfig): ConfigProblem[] {

    const problems: ConfigProblem[] = []
    const { database, git } = config

    const required: Array<[string, string]> = [
        ['database.host', database.host],
        ['database.user', database.user],
        ['database.template_database', database.template_database],
        ['database.database_prefix', database.database_prefix],
    ]

    for (const [field, value] of required) {

        if (value.trim() === '') {

            problems.push({ field, message: 'must not be empty' })
        }
    }

    if (database.port === 0) {

        problems.push({ field: 'database.port', message: 'must not be 0' })
    }

    if (database.database_prefix.trim() !== '' && !PREFIX_PATTERN.test(database.database_prefix)) {

        problems.push({
            field: 'database.database_prefix',
            message: 'must start with a lowercase letter or underscore and contain only a-z, 0-9, _ or $',
        })
    }

    if (git.main_branch.trim() === '') {

        problems.push({ field: 'git.main_branch', message: 'must not be empty' })
    }

    if (git.branch_filter_regex !== null) {

        const regex = compilePattern(git.branch_filter_regex)

        if (regex instanceof Error) {

            problems.push({ field: 'git.branch_filter_regex', message: `invalid regular expression: ${regex.message}` })
        }
    }

    return problems
}
