/**
 * Template context.
 *
 * The values post commands can reference as `{name}` placeholders.
 */
import { getDatabaseName } from '../branch/naming.js';
import type { BaseConfig } from '../config/types.js';

/**
 * Values of one branch switch.
 */
export interface TemplateContext {
    branch_name: string;
    db_name: string;
    db_host: string;
    db_port: number;
    db_user: string;
    db_password: string | null;
    template_db: string;
    prefix: string;
}

/**
 * Build the context of a branch.
 *
 * @example
 * ```typescript
 * const context = createTemplateContext('feature/login', config)
 * // context.db_name === 'pgbranch_feature_login'
 * ```
 */
export function createTemplateContext(branch: string, config: BaseConfig): TemplateContext {

    const { database } = config;

    return {
        branch_name: branch,
        db_name: getDatabaseName(branch, config),
        db_host: database.host,
        db_port: database.port,
        db_user: database.user,
        db_password: database.password,
        template_db: database.template_database,
        prefix: database.database_prefix,
    };

}
