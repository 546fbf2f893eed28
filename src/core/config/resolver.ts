/**
 * Config resolver - merges configuration from three layers.
 *
 * Priority order (highest to lowest):
 * 1. Environment variables (PGBRANCH_*)
 * 2. Local overlay (.pgbranch.local.yml)
 * 3. Base file (.pgbranch.yml)
 * 4. Defaults
 *
 * `disabled_branches` is the exception: the env and local lists are
 * unioned, neither overrides the other.
 */
import { resolve } from 'node:path'

import { attemptSync, clone } from '@logosdx/utils'

import { observer } from '../observer.js'
import { getEnvOverlay } from './env.js'
import { loadBaseConfig, loadLocalConfig } from './loader.js'
import { matchesAnyBranchPattern } from './patterns.js'
import type { BaseConfig, EnvOverlay, GitBranchProvider, LocalOverlay } from './types.js'


/**
 * Inputs of an EffectiveConfig.
 */
export interface EffectiveConfigOptions {

    base: BaseConfig
    local?: LocalOverlay | null
    env?: EnvOverlay

    /** Used to check whether the checked-out branch is disabled */
    git?: GitBranchProvider | null
}


/**
 * The resolved configuration of one invocation.
 *
 * Holds immutable snapshots of the three layers. `merged()` recomputes
 * the full configuration on every call.
 *
 * @example
 * ```typescript
 * const effective = new EffectiveConfig({
 *     base: createDefaultConfig(),
 *     local: { database: { host: 'db.local' } },
 *     env: getEnvOverlay(),
 * })
 *
 * if (effective.shouldExitEarly()) return
 *
 * const config = effective.merged()
 * ```
 */
export class EffectiveConfig {

    readonly disabled: boolean
    readonly skipHooks: boolean
    readonly currentBranchDisabled: boolean

    #base: BaseConfig
    #local: LocalOverlay | null
    #env: EnvOverlay
    #git: GitBranchProvider | null

    constructor(options: EffectiveConfigOptions) {

        this.#base = clone(options.base)
        this.#local = options.local ? clone(options.local) : null
        this.#env = clone(options.env ?? {})
        this.#git = options.git ?? null

        this.disabled = this.#env.disabled ?? this.#local?.disabled ?? false
        this.skipHooks = this.#env.skip_hooks ?? false
        this.currentBranchDisabled = this.#env.current_branch_disabled ?? false
    }

    get base(): BaseConfig {

        return clone(this.#base)
    }

    get local(): LocalOverlay | null {

        return this.#local ? clone(this.#local) : null
    }

    get env(): EnvOverlay {

        return clone(this.#env)
    }

    /**
     * Build the fully resolved configuration.
     */
    merged(): BaseConfig {

        const config = clone(this.#base)

        if (this.#local) {

            applyLocalOverlay(config, clone(this.#local))
        }

        applyEnvOverlay(config, this.#env)

        return config
    }

    /**
     * Whether a branch matches a disabled pattern from the env or the
     * local overlay.
     */
    isBranchDisabled(name: string): boolean {

        return matchesAnyBranchPattern(name, this.#env.disabled_branches ?? [])
            || matchesAnyBranchPattern(name, this.#local?.disabled_branches ?? [])
    }

    /**
     * Whether the checked-out git branch is disabled.
     *
     * No repository or no branch answers false.
     */
    checkCurrentGitBranchDisabled(): boolean {

        if (this.currentBranchDisabled) {

            return true
        }

        const branch = this.#currentGitBranch()

        return branch !== null && this.isBranchDisabled(branch)
    }

    /**
     * Whether branch-sync behavior should stop before any work.
     */
    shouldExitEarly(): boolean {

        if (this.disabled) {

            observer.emit('branch:disabled', { branch: '*', source: 'global' })

            return true
        }

        if (this.currentBranchDisabled) {

            observer.emit('branch:disabled', { branch: '*', source: 'current-branch' })

            return true
        }

        const branch = this.#currentGitBranch()

        if (branch !== null && this.isBranchDisabled(branch)) {

            observer.emit('branch:disabled', { branch, source: 'pattern' })

            return true
        }

        return false
    }

    #currentGitBranch(): string | null {

        const git = this.#git

        if (!git) return null

        const [branch, err] = attemptSync(() => git.getCurrentBranch())

        if (err) {

            observer.emit('git:unavailable', { cwd: process.cwd(), error: err.message })

            return null
        }

        return branch || null
    }
}


/**
 * Apply local overlay leaves. `null` and missing leaves leave the base
 * value untouched; post commands are replaced as a whole.
 */
function applyLocalOverlay(config: BaseConfig, local: LocalOverlay): void {

    const { database, git, behavior } = config

    if (local.database) {

        const db = local.database

        database.host = db.host ?? database.host
        database.port = db.port ?? database.port
        database.user = db.user ?? database.user
        database.password = db.password ?? database.password
        database.template_database = db.template_database ?? database.template_database
        database.database_prefix = db.database_prefix ?? database.database_prefix

        if (db.auth) {

            const auth = db.auth

            database.auth.methods = auth.methods ?? database.auth.methods
            database.auth.pgpass_file = auth.pgpass_file ?? database.auth.pgpass_file
            database.auth.service_name = auth.service_name ?? database.auth.service_name
            database.auth.prompt_for_password = auth.prompt_for_password ?? database.auth.prompt_for_password
        }
    }

    if (local.git) {

        const overlay = local.git

        git.auto_create_on_branch = overlay.auto_create_on_branch ?? git.auto_create_on_branch
        git.auto_switch_on_branch = overlay.auto_switch_on_branch ?? git.auto_switch_on_branch
        git.main_branch = overlay.main_branch ?? git.main_branch
        git.auto_create_branch_filter = overlay.auto_create_branch_filter ?? git.auto_create_branch_filter
        git.branch_filter_regex = overlay.branch_filter_regex ?? git.branch_filter_regex
        git.exclude_branches = overlay.exclude_branches ?? git.exclude_branches
    }

    if (local.behavior) {

        const overlay = local.behavior

        behavior.auto_cleanup = overlay.auto_cleanup ?? behavior.auto_cleanup
        behavior.max_branches = overlay.max_branches ?? behavior.max_branches
        behavior.naming_strategy = overlay.naming_strategy ?? behavior.naming_strategy
    }

    if (local.post_commands) {

        config.post_commands = local.post_commands
    }
}


/**
 * Apply environment overrides.
 */
function applyEnvOverlay(config: BaseConfig, env: EnvOverlay): void {

    const { database, git } = config

    database.host = env.database_host ?? database.host
    database.port = env.database_port ?? database.port
    database.user = env.database_user ?? database.user
    database.password = env.database_password ?? database.password
    database.database_prefix = env.database_prefix ?? database.database_prefix

    git.auto_create_on_branch = env.auto_create ?? git.auto_create_on_branch
    git.auto_switch_on_branch = env.auto_switch ?? git.auto_switch_on_branch
    git.branch_filter_regex = env.branch_filter_regex ?? git.branch_filter_regex
}


/**
 * Options for loadEffectiveConfig.
 */
export interface LoadEffectiveConfigOptions {

    /** Directory to start config discovery from */
    cwd: string

    /** Environment to read PGBRANCH_* from (defaults to process.env) */
    env?: NodeJS.ProcessEnv

    /** Current-branch source; null when there is no repository */
    git?: GitBranchProvider | null
}


/**
 * Result of loadEffectiveConfig.
 */
export interface LoadedEffectiveConfig {

    effective: EffectiveConfig

    /** Discovered base config path, null when defaults were used */
    configPath: string | null

    cwd: string
}


/**
 * Run the three loaders and build the EffectiveConfig.
 *
 * @throws ConfigFileError | ConfigValidationError for malformed files
 * @throws EnvParseError for malformed boolean variables
 *
 * @example
 * ```typescript
 * const { effective, configPath } = loadEffectiveConfig({
 *     cwd: process.cwd(),
 *     git: GitRepository.open(process.cwd()),
 * })
 * ```
 */
export function loadEffectiveConfig(options: LoadEffectiveConfigOptions): LoadedEffectiveConfig {

    const cwd = resolve(options.cwd)
    const envOverlay = getEnvOverlay(options.env ?? process.env)
    const { config, path } = loadBaseConfig(cwd)
    const local = loadLocalConfig(path, cwd)

    const effective = new EffectiveConfig({
        base: config,
        local,
        env: envOverlay,
        git: options.git ?? null,
    })

    return { effective, configPath: path, cwd }
}
