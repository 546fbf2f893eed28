/**
 * Default Configuration
 *
 * Values used when no `.pgbranch.yml` exists or when a section or field
 * is missing from it.
 */
import { clone } from '@logosdx/utils';

import type { AuthMethod, BaseConfig } from './types.js';

/**
 * Base config file names, in lookup order.
 */
export const CONFIG_FILE_NAMES = ['.pgbranch.yml', '.pgbranch.yaml'] as const;

/**
 * Local overlay file name. Lives next to the base file.
 */
export const LOCAL_CONFIG_FILE_NAME = '.pgbranch.local.yml';

/**
 * Logical branch that stands for the template database.
 */
export const MAIN_BRANCH_SENTINEL = '_main';

export const DEFAULT_AUTH_METHODS: readonly AuthMethod[] = [
    'environment',
    'pgpass',
    'password',
    'prompt',
];

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: BaseConfig = {
    database: {
        host: 'localhost',
        port: 5432,
        user: 'postgres',
        password: null,
        template_database: 'template0',
        database_prefix: 'pgbranch',
        auth: {
            methods: [...DEFAULT_AUTH_METHODS],
            pgpass_file: null,
            service_name: null,
            prompt_for_password: false,
        },
    },
    git: {
        auto_create_on_branch: true,
        auto_switch_on_branch: true,
        main_branch: 'main',
        auto_create_branch_filter: null,
        branch_filter_regex: null,
        exclude_branches: ['main', 'master'],
    },
    behavior: {
        auto_cleanup: false,
        max_branches: 10,
        naming_strategy: 'prefix',
    },
    post_commands: [],
};

/**
 * Create a fresh copy of the default configuration.
 *
 * Use this instead of spreading DEFAULT_CONFIG so nested arrays and
 * objects are never shared.
 *
 * @example
 * ```typescript
 * const config = createDefaultConfig()
 * config.git.exclude_branches.push('develop')  // DEFAULT_CONFIG untouched
 * ```
 */
export function createDefaultConfig(): BaseConfig {

    return clone(DEFAULT_CONFIG);

}
