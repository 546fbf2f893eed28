/**
 * Branch switching.
 *
 * The logical branch is written to local state before any database work,
 * so it survives an unreachable server. Database failures are reported as
 * warnings; post command failures propagate.
 */
import { dirname } from 'path';

import { attempt } from '@logosdx/utils';

import { shouldCreateBranch } from '../branch/classifier.js';
import { getDatabaseName, getNormalizedBranchName } from '../branch/naming.js';
import { MAIN_BRANCH_SENTINEL } from '../config/defaults.js';
import type { BaseConfig, GitBranchProvider } from '../config/types.js';
import { observer } from '../observer.js';
import { PostCommandExecutor } from '../post-commands/executor.js';
import type { PostCommandOutcome } from '../post-commands/types.js';
import { createTemplateContext } from '../template/context.js';
import type { SwitchResult, SyncContext } from './types.js';

/**
 * Run the configured post commands for a logical branch.
 */
export async function runPostCommands(ctx: SyncContext, branch: string): Promise<PostCommandOutcome[]> {

    if (ctx.config.post_commands.length === 0) return [];

    const executor = new PostCommandExecutor(createTemplateContext(branch, ctx.config), {
        baseDir: dirname(ctx.configPath),
        runner: ctx.runner,
        env: ctx.env,
    });

    return executor.executeAll(ctx.config.post_commands);

}

/**
 * Make sure the branch database exists.
 *
 * @returns whether it was created, or null when the server failed
 */
async function ensureDatabase(ctx: SyncContext, branch: string, warnings: string[]): Promise<boolean | null> {

    const warn = (message: string): void => {

        warnings.push(message);
        observer.emit('switch:warning', { branch, message });

    };

    const [manager, connectErr] = await attempt(() => ctx.connect());

    if (connectErr) {

        warn(`Could not connect to the database server, branch state was still updated: ${connectErr.message}`);

        return null;

    }

    const [result, createErr] = await attempt(() => manager.createDatabaseBranch(branch));
    const [, closeErr] = await attempt(() => manager.close());

    if (closeErr) {

        warn(`Failed to close the database connection: ${closeErr.message}`);

    }

    if (createErr) {

        warn(`Failed to create the branch database, branch state was still updated: ${createErr.message}`);

        return null;

    }

    return result.created;

}

/**
 * Switch to a branch database, creating it when missing.
 *
 * @throws LocalStateError when the state file cannot be written
 * @throws PostCommandError when a post command fails
 *
 * @example
 * ```typescript
 * const result = await switchToBranch(ctx, 'feature/login')
 * // result.branch === 'feature_login'
 * ```
 */
export async function switchToBranch(ctx: SyncContext, name: string): Promise<SwitchResult> {

    const branch = getNormalizedBranchName(name);
    const database = getDatabaseName(branch, ctx.config);

    observer.emit('switch:start', { branch, database });

    ctx.state.setCurrentBranch(ctx.configPath, branch);

    const warnings: string[] = [];
    const created = await ensureDatabase(ctx, branch, warnings);

    observer.emit('switch:complete', { branch, database });

    const postCommands = await runPostCommands(ctx, branch);

    return { branch, database, created, warnings, postCommands };

}

/**
 * Switch to the template database.
 *
 * No database work is done: the template always exists.
 */
export async function switchToMain(ctx: SyncContext): Promise<SwitchResult> {

    const branch = MAIN_BRANCH_SENTINEL;
    const database = ctx.config.database.template_database;

    observer.emit('switch:start', { branch, database });

    ctx.state.setCurrentBranch(ctx.configPath, branch);

    observer.emit('switch:complete', { branch, database });

    const postCommands = await runPostCommands(ctx, branch);

    return { branch, database, created: false, warnings: [], postCommands };

}

/**
 * Logical branch a checkout defaults to when local state has none.
 *
 * The main git branch and branches that would not get a database map to
 * `_main`; a creatable branch maps to its normalized name.
 */
export function detectDefaultBranch(config: BaseConfig, git: GitBranchProvider | null): string {

    const current = git?.getCurrentBranch() ?? null;

    if (current === null || current === config.git.main_branch) return MAIN_BRANCH_SENTINEL;

    return shouldCreateBranch(current, config)
        ? getNormalizedBranchName(current)
        : MAIN_BRANCH_SENTINEL;

}

/**
 * Logical branch in use: local state, else the git-derived default.
 *
 * @throws LocalStateError for a corrupt state file
 */
export function resolveCurrentBranch(ctx: Pick<SyncContext, 'config' | 'configPath' | 'state' | 'git'>): string {

    return ctx.state.getCurrentBranch(ctx.configPath) ?? detectDefaultBranch(ctx.config, ctx.git);

}
