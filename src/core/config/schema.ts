/**
 * Configuration Zod schemas and validation.
 *
 * The base schema fills every missing field from DEFAULT_CONFIG, so an
 * empty document parses to the full default configuration. The local
 * overlay schema keeps every leaf optional and accepts `null` as unset.
 */
import { z } from 'zod';

import { DEFAULT_CONFIG } from './defaults.js';
import type { BaseConfig, LocalOverlay, PostCommand } from './types.js';

const defaults = DEFAULT_CONFIG;

export const NamingStrategySchema = z.enum(['prefix', 'suffix', 'replace']);

export const AuthMethodSchema = z.enum([
    'password',
    'pgpass',
    'environment',
    'service',
    'prompt',
    'system',
]);

/**
 * Port number validation. Zero is accepted here and reported by
 * validateResolvedConfig, so a bad port never hides the rest of the file.
 */
const PortSchema = z
    .number()
    .int('Port must be an integer')
    .min(0, 'Port must be at least 0')
    .max(65535, 'Port must be at most 65535');

/**
 * Environment values may be written as YAML numbers or booleans.
 */
const EnvValueSchema = z
    .union([z.string(), z.number(), z.boolean()])
    .transform((value) => String(value));

// ─────────────────────────────────────────────────────────────
// Post commands
// ─────────────────────────────────────────────────────────────

export const ShellCommandSchema = z.object({
    name: z.string().optional(),
    command: z.string({ required_error: 'command is required' }),
    working_dir: z.string().optional(),
    continue_on_error: z.boolean().optional(),
    condition: z.string().optional(),
    environment: z.record(EnvValueSchema).optional(),
});

export const ReplaceCommandSchema = z.object({
    action: z.literal('replace'),
    name: z.string().optional(),
    file: z.string({ required_error: 'file is required for replace actions' }),
    pattern: z.string({ required_error: 'pattern is required for replace actions' }),
    replacement: z.string({ required_error: 'replacement is required for replace actions' }),
    create_if_missing: z.boolean().optional(),
    continue_on_error: z.boolean().optional(),
    condition: z.string().optional(),
});

function isRecord(value: unknown): value is Record<string, unknown> {

    return typeof value === 'object' && value !== null && !Array.isArray(value);

}

function forwardIssues(ctx: z.RefinementCtx, error: z.ZodError): never {

    for (const issue of error.issues) {

        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: issue.message,
            path: issue.path,
        });

    }

    return z.NEVER;

}

/**
 * Post command decoded by shape.
 *
 * Order is fixed: plain string, then object with `action`, then object
 * without `action`. Anything ambiguous or unmatched is rejected.
 */
export const PostCommandSchema = z.unknown().transform((value, ctx): PostCommand => {

    if (typeof value === 'string') {

        return value;

    }

    if (!isRecord(value)) {

        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'Post command must be a string or a mapping',
        });

        return z.NEVER;

    }

    if (!('action' in value)) {

        const result = ShellCommandSchema.safeParse(value);

        return result.success ? result.data : forwardIssues(ctx, result.error);

    }

    if ('command' in value) {

        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'Post command cannot have both "command" and "action"',
        });

        return z.NEVER;

    }

    if (value['action'] !== 'replace') {

        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown post command action "${String(value['action'])}" (expected "replace")`,
            path: ['action'],
        });

        return z.NEVER;

    }

    const result = ReplaceCommandSchema.safeParse(value);

    return result.success ? result.data : forwardIssues(ctx, result.error);

});

// ─────────────────────────────────────────────────────────────
// Base config
// ─────────────────────────────────────────────────────────────

const AuthSchema = z.object({
    methods: z.array(AuthMethodSchema).default([...defaults.database.auth.methods]),
    pgpass_file: z.string().nullable().default(null),
    service_name: z.string().nullable().default(null),
    prompt_for_password: z.boolean().default(false),
});

const DatabaseSchema = z.object({
    host: z.string().default(defaults.database.host),
    port: PortSchema.default(defaults.database.port),
    user: z.string().default(defaults.database.user),
    password: z.string().nullable().default(null),
    template_database: z.string().default(defaults.database.template_database),
    database_prefix: z.string().default(defaults.database.database_prefix),
    auth: AuthSchema.default({}),
});

const GitSchema = z.object({
    auto_create_on_branch: z.boolean().default(defaults.git.auto_create_on_branch),
    auto_switch_on_branch: z.boolean().default(defaults.git.auto_switch_on_branch),
    main_branch: z.string().default(defaults.git.main_branch),
    auto_create_branch_filter: z.string().nullable().default(null),
    branch_filter_regex: z.string().nullable().default(null),
    exclude_branches: z.array(z.string()).default([...defaults.git.exclude_branches]),
});

const BehaviorSchema = z.object({
    auto_cleanup: z.boolean().default(defaults.behavior.auto_cleanup),
    max_branches: z.number().int().min(1, 'max_branches must be at least 1').nullable().default(defaults.behavior.max_branches),
    naming_strategy: NamingStrategySchema.default(defaults.behavior.naming_strategy),
});

/**
 * Full base config schema.
 *
 * Unknown keys are dropped, which also discards the legacy
 * `current_branch` field.
 */
export const BaseConfigSchema = z.object({
    database: DatabaseSchema.default({}),
    git: GitSchema.default({}),
    behavior: BehaviorSchema.default({}),
    post_commands: z.array(PostCommandSchema).default([]),
});

// ─────────────────────────────────────────────────────────────
// Local overlay
// ─────────────────────────────────────────────────────────────

export const LocalOverlaySchema = z.object({
    database: z.object({
        host: z.string().nullish(),
        port: PortSchema.nullish(),
        user: z.string().nullish(),
        password: z.string().nullish(),
        template_database: z.string().nullish(),
        database_prefix: z.string().nullish(),
        auth: z.object({
            methods: z.array(AuthMethodSchema).nullish(),
            pgpass_file: z.string().nullish(),
            service_name: z.string().nullish(),
            prompt_for_password: z.boolean().nullish(),
        }).nullish(),
    }).nullish(),
    git: z.object({
        auto_create_on_branch: z.boolean().nullish(),
        auto_switch_on_branch: z.boolean().nullish(),
        main_branch: z.string().nullish(),
        auto_create_branch_filter: z.string().nullish(),
        branch_filter_regex: z.string().nullish(),
        exclude_branches: z.array(z.string()).nullish(),
    }).nullish(),
    behavior: z.object({
        auto_cleanup: z.boolean().nullish(),
        max_branches: z.number().int().min(1, 'max_branches must be at least 1').nullish(),
        naming_strategy: NamingStrategySchema.nullish(),
    }).nullish(),
    post_commands: z.array(PostCommandSchema).nullish(),
    disabled: z.boolean().nullish(),
    disabled_branches: z.array(z.string()).nullish(),
});

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when config validation fails.
 *
 * Includes the specific field that failed, all validation issues and
 * the file the document came from, when known.
 */
export class ConfigValidationError extends Error {

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
        public readonly path: string | null = null,
    ) {

        super(message);
        this.name = 'ConfigValidationError';

    }

}

function toValidationError(error: z.ZodError, path: string | null): ConfigValidationError {

    const firstIssue = error.issues[0];
    const field = firstIssue?.path.join('.') || 'root';
    const detail = `${field}: ${firstIssue?.message ?? 'Validation failed'}`;

    return new ConfigValidationError(
        path ? `Invalid configuration in ${path}: ${detail}` : `Invalid configuration: ${detail}`,
        field,
        error.issues,
        path,
    );

}

/**
 * Parse a base config document, filling defaults.
 *
 * @throws ConfigValidationError if the document does not match
 *
 * @example
 * ```typescript
 * const config = parseBaseConfig({ database: { host: 'db.local' } })
 * // config.database.port === 5432 (default)
 * // config.git.exclude_branches => ['main', 'master']
 * ```
 */
export function parseBaseConfig(raw: unknown, path: string | null = null): BaseConfig {

    const result = BaseConfigSchema.safeParse(raw ?? {});

    if (!result.success) {

        throw toValidationError(result.error, path);

    }

    return result.data;

}

/**
 * Parse a local overlay document. Unset and `null` leaves stay unset.
 *
 * @throws ConfigValidationError if the document does not match
 */
export function parseLocalOverlay(raw: unknown, path: string | null = null): LocalOverlay {

    const result = LocalOverlaySchema.safeParse(raw ?? {});

    if (!result.success) {

        throw toValidationError(result.error, path);

    }

    return result.data;

}

/**
 * Parse a single post command.
 *
 * @throws ConfigValidationError for an ambiguous or unknown shape
 *
 * @example
 * ```typescript
 * parsePostCommand('npm run migrate')                      // string
 * parsePostCommand({ command: 'make seed' })               // shell command
 * parsePostCommand({ action: 'replace', file: '.env', ... }) // replace action
 * parsePostCommand({ action: 'replace', command: 'x' })    // throws
 * ```
 */
export function parsePostCommand(raw: unknown): PostCommand {

    const result = PostCommandSchema.safeParse(raw);

    if (!result.success) {

        throw toValidationError(result.error, null);

    }

    return result.data;

}
