/**
 * Template module.
 *
 * Builds the per-branch context and substitutes `{name}` placeholders in
 * post commands.
 *
 * @example
 * ```typescript
 * import { createTemplateContext, substituteTemplateVariables } from './core/template'
 *
 * const context = createTemplateContext('feature/login', config)
 * substituteTemplateVariables('DATABASE_NAME={db_name}', context)
 * // 'DATABASE_NAME=pgbranch_feature_login'
 * ```
 */
export { createTemplateContext, type TemplateContext } from './context.js';

export {
    substituteTemplateVariables,
    listTemplateVariables,
    type TemplateVariable,
} from './substitute.js';
