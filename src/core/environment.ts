/**
 * Environment Detection
 *
 * Utilities for detecting the runtime environment (CI, debug, log level).
 * These variables steer logging only; the configuration overlay read from
 * PGBRANCH_* variables lives in config/env.ts.
 */
import type { LogLevel } from './logger/types.js';

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'TRAVIS',
    'JENKINS_URL',
    'BUILDKITE',
    'TEAMCITY_VERSION',
    'TF_BUILD',
    'BITBUCKET_BUILD_NUMBER',
];

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'verbose'];

/**
 * Detect if running in a CI environment.
 *
 * @example
 * ```typescript
 * if (isCi()) {
 *     // No colors, plain lines
 * }
 * ```
 */
export function isCi(env: NodeJS.ProcessEnv = process.env): boolean {

    for (const envVar of CI_ENV_VARS) {

        if (env[envVar]) {

            return true;

        }

    }

    return false;

}

/**
 * Check if debug logging is enabled.
 *
 * @returns true if PGBRANCH_DEBUG is set to 'true'
 */
export function isDebug(env: NodeJS.ProcessEnv = process.env): boolean {

    return env['PGBRANCH_DEBUG'] === 'true';

}

/**
 * Resolve the log level from PGBRANCH_LOG_LEVEL.
 *
 * Unknown values fall back to the default. PGBRANCH_DEBUG forces verbose.
 *
 * @example
 * ```typescript
 * getLogLevel({ PGBRANCH_LOG_LEVEL: 'info' })  // 'info'
 * getLogLevel({ PGBRANCH_DEBUG: 'true' })      // 'verbose'
 * getLogLevel({})                              // 'warn'
 * ```
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {

    if (isDebug(env)) {

        return 'verbose';

    }

    const raw = env['PGBRANCH_LOG_LEVEL']?.trim().toLowerCase();
    const match = LOG_LEVELS.find((level) => level === raw);

    return match ?? 'warn';

}
