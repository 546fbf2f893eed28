/**
 * Branch pattern matching.
 *
 * Disabled-branch patterns are exact names unless they contain `*`. A
 * glob is turned into a regular expression by replacing each `*` with
 * `.*`; nothing else is escaped and the result is not anchored, so
 * `release/*` also matches `old-release/1` and `.` matches any character.
 */
import { attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'


/**
 * Compile a regular expression, returning the error instead of throwing.
 */
export function compilePattern(source: string): RegExp | Error {

    const [regex, err] = attemptSync(() => new RegExp(source))

    if (err) return err

    return regex
}


/**
 * Translate a `*` glob into its regular expression source.
 *
 * @example
 * ```typescript
 * globToRegexSource('release/*')  // 'release/.*'
 * ```
 */
export function globToRegexSource(pattern: string): string {

    return pattern.replaceAll('*', '.*')
}


/**
 * Test a branch name against one disabled-branch pattern.
 *
 * A pattern that fails to compile does not match and emits
 * `branch:pattern-invalid`.
 *
 * @example
 * ```typescript
 * matchesBranchPattern('release/2.0', 'release/*')  // true
 * matchesBranchPattern('hotfix-1', 'hotfix-1')      // true
 * matchesBranchPattern('hotfix-10', 'hotfix-1')     // false
 * ```
 */
export function matchesBranchPattern(name: string, pattern: string): boolean {

    if (!pattern.includes('*')) {

        return name === pattern
    }

    const regex = compilePattern(globToRegexSource(pattern))

    if (regex instanceof Error) {

        observer.emit('branch:pattern-invalid', { pattern, error: regex.message })

        return false
    }

    return regex.test(name)
}


/**
 * Test a branch name against any of several patterns.
 */
export function matchesAnyBranchPattern(name: string, patterns: readonly string[]): boolean {

    return patterns.some((pattern) => matchesBranchPattern(name, pattern))
}
