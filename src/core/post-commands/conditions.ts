/**
 * Post command conditions.
 *
 * Supported forms:
 * - `file_exists:<path>` - a file exists, relative to the project directory
 * - `dir_exists:<path>` - a directory exists
 * - `env_set:<NAME>` - an environment variable is set and non-empty
 */
import { statSync } from 'fs';
import { resolve } from 'path';

import { attemptSync } from '@logosdx/utils';

/**
 * Where conditions are evaluated.
 */
export interface ConditionContext {
    baseDir: string;
    env: NodeJS.ProcessEnv;
}

/**
 * Evaluate a condition.
 *
 * @returns whether it holds, or null for an unknown condition
 *
 * @example
 * ```typescript
 * evaluateCondition('file_exists:manage.py', { baseDir, env: process.env })  // true | false
 * evaluateCondition('branch_is:main', { baseDir, env: process.env })         // null
 * ```
 */
export function evaluateCondition(condition: string, context: ConditionContext): boolean | null {

    const separator = condition.indexOf(':');

    if (separator === -1) return null;

    const kind = condition.slice(0, separator).trim();
    const argument = condition.slice(separator + 1).trim();

    switch (kind) {

    case 'file_exists': {
        const [stat] = attemptSync(() => statSync(resolve(context.baseDir, argument)));

        return stat?.isFile() ?? false;
    }

    case 'dir_exists': {
        const [stat] = attemptSync(() => statSync(resolve(context.baseDir, argument)));

        return stat?.isDirectory() ?? false;
    }

    case 'env_set':
        return Boolean(context.env[argument]);

    default:
        return null;

    }

}
