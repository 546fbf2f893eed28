/**
 * Placeholder substitution for post commands.
 *
 * `{db_password}` is only replaced when a password is known; otherwise
 * the placeholder stays in the text.
 */
import type { TemplateContext } from './context.js';

/**
 * A row of the `templates` listing.
 */
export interface TemplateVariable {
    name: string;
    value: string;
    description: string;
}

const DESCRIPTIONS: Record<keyof TemplateContext, string> = {
    branch_name: 'Branch name as given',
    db_name: 'Database name for the branch',
    db_host: 'Database host',
    db_port: 'Database port',
    db_user: 'Database user',
    db_password: 'Database password (if configured)',
    template_db: 'Template database',
    prefix: 'Database prefix',
};

const VARIABLE_ORDER: readonly (keyof TemplateContext)[] = [
    'branch_name',
    'db_name',
    'db_host',
    'db_port',
    'db_user',
    'db_password',
    'template_db',
    'prefix',
];

/**
 * Replace `{name}` placeholders with context values.
 *
 * @example
 * ```typescript
 * substituteTemplateVariables('psql -d {db_name}', context)
 * // 'psql -d pgbranch_feature_login'
 * ```
 */
export function substituteTemplateVariables(template: string, context: TemplateContext): string {

    let result = template;

    for (const name of VARIABLE_ORDER) {

        const value = context[name];

        if (value === null) continue;

        result = result.replaceAll(`{${name}}`, String(value));

    }

    return result;

}

/**
 * The variables of a context, password masked.
 */
export function listTemplateVariables(context: TemplateContext): TemplateVariable[] {

    return VARIABLE_ORDER.map((name) => {

        const value = context[name];

        let display: string;

        if (name === 'db_password') {

            display = value === null ? '(not set)' : '***';

        }
        else {

            display = String(value);

        }

        return { name, value: display, description: DESCRIPTIONS[name] };

    });

}
