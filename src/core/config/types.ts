/**
 * Configuration types.
 *
 * Three layers feed the effective configuration: the versioned base file
 * (`.pgbranch.yml`), an optional git-ignored local overlay
 * (`.pgbranch.local.yml`) and the PGBRANCH_* environment variables.
 */


/**
 * How a sanitized branch name is combined with the database prefix.
 */
export type NamingStrategy = 'prefix' | 'suffix' | 'replace'


/**
 * Password sources, tried in the configured order.
 */
export type AuthMethod =
    | 'password'
    | 'pgpass'
    | 'environment'
    | 'service'
    | 'prompt'
    | 'system'


export interface AuthConfig {

    methods: AuthMethod[]
    pgpass_file: string | null
    service_name: string | null
    prompt_for_password: boolean
}


export interface DatabaseConfig {

    host: string
    port: number
    user: string
    password: string | null
    template_database: string
    database_prefix: string
    auth: AuthConfig
}


export interface GitConfig {

    auto_create_on_branch: boolean
    auto_switch_on_branch: boolean
    main_branch: string

    /** Older spelling of `branch_filter_regex`, used when that one is unset */
    auto_create_branch_filter: string | null
    branch_filter_regex: string | null
    exclude_branches: string[]
}


export interface BehaviorConfig {

    auto_cleanup: boolean
    max_branches: number | null
    naming_strategy: NamingStrategy
}


/**
 * Shell command with options.
 *
 * @example
 * ```yaml
 * post_commands:
 *   - name: Run migrations
 *     command: python manage.py migrate
 *     condition: file_exists:manage.py
 *     environment:
 *       DATABASE_URL: postgres://{db_user}@{db_host}:{db_port}/{db_name}
 * ```
 */
export interface ShellCommand {

    name?: string
    command: string
    working_dir?: string
    continue_on_error?: boolean
    condition?: string
    environment?: Record<string, string>
}


/**
 * In-place file edit.
 *
 * @example
 * ```yaml
 * post_commands:
 *   - action: replace
 *     file: .env
 *     pattern: '^DATABASE_NAME=.*$'
 *     replacement: 'DATABASE_NAME={db_name}'
 *     create_if_missing: true
 * ```
 */
export interface ReplaceCommand {

    action: 'replace'
    name?: string
    file: string
    pattern: string
    replacement: string
    create_if_missing?: boolean
    continue_on_error?: boolean
    condition?: string
}


/**
 * A post command is a plain shell string, a shell command with options
 * or a replace action. The variant is decided by shape, not by a tag.
 */
export type PostCommand = string | ShellCommand | ReplaceCommand


/**
 * Fully populated base configuration.
 */
export interface BaseConfig {

    database: DatabaseConfig
    git: GitConfig
    behavior: BehaviorConfig
    post_commands: PostCommand[]
}


/**
 * Nullable view of an object: every key optional, `null` meaning unset.
 */
type Overlay<T> = { [K in keyof T]?: T[K] | null }


/**
 * Local overlay. Every leaf is optional and `null` counts as unset.
 */
export interface LocalOverlay {

    database?: (Overlay<Omit<DatabaseConfig, 'auth'>> & { auth?: Overlay<AuthConfig> | null }) | null
    git?: Overlay<GitConfig> | null
    behavior?: Overlay<BehaviorConfig> | null
    post_commands?: PostCommand[] | null

    /** Disable pgbranch entirely for this checkout */
    disabled?: boolean | null

    /** Exact names or `*` globs of branches to ignore */
    disabled_branches?: string[] | null
}


/**
 * Values read from PGBRANCH_* variables. Absent keys were not set.
 */
export interface EnvOverlay {

    disabled?: boolean
    skip_hooks?: boolean
    auto_create?: boolean
    auto_switch?: boolean
    current_branch_disabled?: boolean
    branch_filter_regex?: string
    database_host?: string
    database_user?: string
    database_password?: string
    database_prefix?: string
    database_port?: number
    disabled_branches?: string[]
}


/**
 * Supplies the checked-out git branch to the resolver.
 */
export interface GitBranchProvider {

    getCurrentBranch(): string | null
}
