/**
 * Branch name to database name mapping.
 *
 * Every derived name is at most 63 bytes and matches
 * `^[a-z_][a-z0-9_$]*$` as long as the configured prefix does.
 *
 * @example
 * ```typescript
 * getDatabaseName('Feature/Auth-2', config)
 * // prefix  => 'pgbranch_feature_auth_2'
 * // suffix  => 'feature_auth_2_pgbranch'
 * // replace => 'feature_auth_2'
 * ```
 */
import { createHash } from 'crypto';

import { MAIN_BRANCH_SENTINEL } from '../config/defaults.js';
import type { BaseConfig, NamingStrategy } from '../config/types.js';

/**
 * PostgreSQL identifier limit (NAMEDATALEN - 1).
 */
export const MAX_DATABASE_NAME_BYTES = 63;

/**
 * Length of the `_xxxx` suffix added to oversized names.
 */
const HASH_SUFFIX_BYTES = 5;

const FALLBACK_NAME = 'branch';

/**
 * Sanitize a branch name into identifier characters.
 *
 * Lowercases, maps anything outside `[a-z0-9_$]` to `_`, prefixes `_`
 * when the result starts with a digit, collapses `_` runs and strips
 * trailing `_`. An empty result becomes `branch`.
 *
 * Idempotent: `sanitizeBranchName(sanitizeBranchName(x)) === sanitizeBranchName(x)`.
 *
 * @example
 * ```typescript
 * sanitizeBranchName('Feature/Auth-2')  // 'feature_auth_2'
 * sanitizeBranchName('123-fix')         // '_123_fix'
 * sanitizeBranchName('///')             // 'branch'
 * ```
 */
export function sanitizeBranchName(name: string): string {

    let sanitized = '';

    for (const ch of name.toLowerCase()) {

        sanitized += /^[a-z0-9_$]$/.test(ch) ? ch : '_';

    }

    if (/^[0-9]/.test(sanitized)) {

        sanitized = `_${sanitized}`;

    }

    sanitized = sanitized.replace(/_{2,}/g, '_').replace(/_+$/, '');

    return sanitized === '' ? FALLBACK_NAME : sanitized;

}

/**
 * Normalized form of a branch name, used for display and local state.
 */
export function getNormalizedBranchName(name: string): string {

    return sanitizeBranchName(name);

}

/**
 * 16-bit hash of a name as 4 lowercase hex digits.
 *
 * Taken from the first two bytes of the name's SHA-256.
 */
export function hashName(name: string): string {

    return createHash('sha256').update(name, 'utf8').digest('hex').slice(0, 4);

}

/**
 * Cut a string to at most `maxBytes` UTF-8 bytes without splitting a
 * character.
 *
 * Only a multibyte character at the cut point leaves the result short of
 * `maxBytes`. Sanitized branch parts are ASCII, so that takes a non-ASCII
 * prefix, which validateResolvedConfig rejects.
 */
function truncateBytes(value: string, maxBytes: number): string {

    let result = '';
    let bytes = 0;

    for (const ch of value) {

        const size = Buffer.byteLength(ch, 'utf8');

        if (bytes + size > maxBytes) break;

        result += ch;
        bytes += size;

    }

    return result;

}

/**
 * Enforce the identifier length limit.
 *
 * Oversized names are truncated and suffixed with `_` plus the hash of
 * the full name, so two long names sharing a prefix stay distinct.
 *
 * @example
 * ```typescript
 * ensureValidPostgresName('pgbranch_short')  // unchanged
 * ensureValidPostgresName('pgbranch_' + 'x'.repeat(80))
 * // first 58 bytes + '_' + 4 hex digits, 63 bytes in all
 * ```
 */
export function ensureValidPostgresName(name: string): string {

    if (Buffer.byteLength(name, 'utf8') <= MAX_DATABASE_NAME_BYTES) {

        return name;

    }

    const truncated = truncateBytes(name, MAX_DATABASE_NAME_BYTES - HASH_SUFFIX_BYTES);

    return `${truncated}_${hashName(name)}`;

}

function combineName(sanitized: string, prefix: string, strategy: NamingStrategy): string {

    switch (strategy) {

    case 'prefix':
        return `${prefix}_${sanitized}`;

    case 'suffix':
        return `${sanitized}_${prefix}`;

    case 'replace':
        return sanitized;

    }

}

/**
 * Map a git branch (or `_main`) to its database name.
 *
 * `_main` and excluded branches map to the template database verbatim.
 * A name that would start with `$` gets a leading `_`.
 */
export function getDatabaseName(branch: string, config: BaseConfig): string {

    if (branch === MAIN_BRANCH_SENTINEL || config.git.exclude_branches.includes(branch)) {

        return config.database.template_database;

    }

    const combined = combineName(
        sanitizeBranchName(branch),
        config.database.database_prefix,
        config.behavior.naming_strategy,
    );

    // `$` may not start an identifier; only suffix and replace names can
    return ensureValidPostgresName(combined.startsWith('$') ? `_${combined}` : combined);

}

/**
 * Recover the sanitized branch part of a database name.
 *
 * Returns null when the name does not carry the configured prefix or
 * suffix. Names that were hash-truncated come back truncated.
 *
 * @example
 * ```typescript
 * extractBranchName('pgbranch_feature_x', config)  // 'feature_x'
 * extractBranchName('other_db', config)            // null
 * ```
 */
export function extractBranchName(databaseName: string, config: BaseConfig): string | null {

    const prefix = config.database.database_prefix;

    switch (config.behavior.naming_strategy) {

    case 'prefix':
        return databaseName.startsWith(`${prefix}_`)
            ? databaseName.slice(prefix.length + 1)
            : null;

    case 'suffix':
        return databaseName.endsWith(`_${prefix}`)
            ? databaseName.slice(0, -(prefix.length + 1))
            : null;

    case 'replace':
        return databaseName;

    }

}
