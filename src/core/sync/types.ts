/**
 * Branch sync types.
 */
import type { EffectiveConfig } from '../config/resolver.js';
import type { BaseConfig, GitBranchProvider } from '../config/types.js';
import type { DatabaseManager } from '../db/manager.js';
import type { PostCommandOutcome } from '../post-commands/types.js';
import type { CommandRunner } from '../post-commands/types.js';
import type { LocalStateStore } from '../state/manager.js';

/**
 * Collaborators of a branch switch.
 *
 * Built once per command from the effective configuration. Tests hand in
 * a DatabaseManager over fake operations and a recording runner.
 */
export interface SyncContext {
    effective: EffectiveConfig;

    /** `effective.merged()`, computed once for the command */
    config: BaseConfig;

    /** Discovered base config path */
    configPath: string;

    state: LocalStateStore;
    git: GitBranchProvider | null;

    /** Opens a database manager; a rejection becomes a switch warning */
    connect: () => Promise<DatabaseManager>;

    /** Post command runner (defaults to a spawned shell) */
    runner?: CommandRunner;

    /** Environment post commands inherit */
    env?: NodeJS.ProcessEnv;
}

/**
 * Result of switching the logical branch.
 */
export interface SwitchResult {

    /** Logical branch written to local state */
    branch: string;
    database: string;

    /** Null when the database could not be checked */
    created: boolean | null;
    warnings: string[];
    postCommands: PostCommandOutcome[];
}

/**
 * What a git hook invocation did.
 */
export type HookAction =
    | 'skipped'
    | 'no-branch'
    | 'ignored'
    | 'not-creatable'
    | 'main'
    | 'switched';

export interface HookResult {
    action: HookAction;
    branch: string | null;
    switch?: SwitchResult;
}
