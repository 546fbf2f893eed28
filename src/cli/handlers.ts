/**
 * Command handlers.
 *
 * Each handler maps to one command and resolves an exit code. Results go
 * to stdout through `ctx.print`; progress and warnings reach stderr as
 * log lines from observer events.
 *
 * Uses `attempt` for control flow around the database.
 */
import { join } from 'node:path';
import { existsSync } from 'node:fs';

import { attempt } from '@logosdx/utils';
import { stringify as stringifyYaml } from 'yaml';

import {
    CONFIG_FILE_NAMES,
    MAIN_BRANCH_SENTINEL,
    compilePattern,
    createDefaultConfig,
    createTemplateContext,
    findComposeFiles,
    getDatabaseName,
    getNormalizedBranchName,
    handleGitHook,
    hooksInstalled,
    installHooks,
    isMainBranch,
    listTemplateVariables,
    parsePostgresFromCompose,
    resolveCurrentBranch,
    runPostCommands,
    saveConfigFile,
    switchToBranch,
    switchToMain,
    uninstallHooks,
    validateResolvedConfig,
    type DatabaseManager,
    type PostCommandOutcome,
    type SwitchResult,
    type SyncContext,
} from '../core/index.js';
import { status, theme, ui } from '../core/theme.js';
import type { BaseContext, CliFlags, CommandContext } from './types.js';

export const NO_CONFIG_MESSAGE =
    "No configuration file found. Run 'pgbranch init' to create a .pgbranch.yml file first.";

/** Branch used by `templates` when none is given */
export const EXAMPLE_BRANCH = 'feature/example-branch';

const DEFAULT_MAX_BRANCHES = 10;

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

/**
 * Sync collaborators of a command that found a config file.
 */
export function toSyncContext(ctx: CommandContext): SyncContext {

    const configPath = ctx.loaded.configPath;

    if (configPath === null) {

        throw new Error(NO_CONFIG_MESSAGE);

    }

    return {
        effective: ctx.loaded.effective,
        config: ctx.config,
        configPath,
        state: ctx.state,
        git: ctx.git,
        connect: () => ctx.connect(ctx.config),
        runner: ctx.runner,
        env: ctx.env,
    };

}

/**
 * Run an operation against the server, closing the connection after.
 */
async function withDatabase<T>(ctx: CommandContext, operation: (manager: DatabaseManager) => Promise<T>): Promise<T> {

    const manager = await ctx.connect(ctx.config);

    try {

        return await operation(manager);

    }
    finally {

        await manager.close();

    }

}

function requireBranchArg(args: string[], ctx: BaseContext, command: string): string | null {

    const branch = args[0];

    if (!branch) {

        ctx.print(status.error(`Missing branch name. Usage: pgbranch ${command} <branch>`));

        return null;

    }

    return branch;

}

function printOutcomes(ctx: BaseContext, outcomes: readonly PostCommandOutcome[]): void {

    for (const outcome of outcomes) {

        switch (outcome.status) {

        case 'completed':
            ctx.print(status.success(outcome.name));
            break;

        case 'skipped':
            ctx.print(status.info(`${outcome.name} (skipped: ${outcome.detail ?? 'condition'})`));
            break;

        case 'failed':
            ctx.print(status.warning(`${outcome.name} failed: ${outcome.detail ?? 'unknown error'}`));
            break;

        }

    }

}

function printSwitch(ctx: BaseContext, result: SwitchResult): void {

    for (const warning of result.warnings) {

        ctx.print(status.warning(warning));

    }

    if (result.branch === MAIN_BRANCH_SENTINEL) {

        ctx.print(status.success(`Switched to main database: ${result.database}`));

    }
    else {

        ctx.print(status.success(`Switched to PostgreSQL branch: ${result.branch}`));

    }

    printOutcomes(ctx, result.postCommands);

}

// ─────────────────────────────────────────────────────────────
// Setup
// ─────────────────────────────────────────────────────────────

/**
 * init: write `.pgbranch.yml` in the working directory.
 */
export async function handleInit(_args: string[], flags: CliFlags, ctx: BaseContext): Promise<number> {

    const path = join(ctx.cwd, CONFIG_FILE_NAMES[0]);

    if (existsSync(path) && !flags.force) {

        ctx.print(status.error('Configuration file already exists. Use --force to overwrite.'));

        return 1;

    }

    const config = createDefaultConfig();
    const detected = ctx.git?.detectMainBranch() ?? null;

    if (detected) {

        config.git.main_branch = detected;
        ctx.print(status.info(`Detected main Git branch: ${detected}`));

    }
    else {

        ctx.print(status.warning(`Could not detect the main Git branch, using default: ${config.git.main_branch}`));

    }

    if (flags.fromCompose) {

        const files = findComposeFiles(ctx.cwd);
        const compose = files.length > 0 ? parsePostgresFromCompose(files) : null;

        if (compose) {

            config.database.host = compose.host;
            config.database.port = compose.port ?? config.database.port;
            config.database.user = compose.user ?? config.database.user;
            config.database.password = compose.password ?? config.database.password;
            config.database.template_database = compose.database ?? config.database.template_database;

            ctx.print(status.success(`Using PostgreSQL settings of service "${compose.service}" from ${compose.file}`));

        }
        else if (files.length > 0) {

            ctx.print(status.info('No PostgreSQL service found in Docker Compose files'));

        }
        else {

            ctx.print(status.info('No Docker Compose files found'));

        }

    }

    saveConfigFile(path, config);

    ctx.print(status.success(`Initialized pgbranch configuration at: ${path}`));

    return 0;

}

/**
 * config: print the effective configuration, password masked.
 */
export async function handleConfig(_args: string[], _flags: CliFlags, ctx: CommandContext): Promise<number> {

    const { configPath, effective } = ctx.loaded;
    const shown = {
        ...ctx.config,
        database: {
            ...ctx.config.database,
            password: ctx.config.database.password === null ? null : '***',
        },
    };

    ctx.print(`# ${configPath ?? 'built-in defaults (no .pgbranch.yml found)'}`);

    if (effective.disabled) {

        ctx.print('# pgbranch is disabled for this checkout');

    }

    ctx.print(stringifyYaml(shown, { indent: 2 }).trimEnd());

    return 0;

}

/**
 * check: configuration, server and repository diagnostics.
 */
export async function handleCheck(_args: string[], _flags: CliFlags, ctx: CommandContext): Promise<number> {

    const { config } = ctx;
    const { configPath } = ctx.loaded;
    let failed = false;

    const row = (ok: boolean, label: string, detail: string): void => {

        if (!ok) failed = true;

        ctx.print(`${ui.check(ok)} ${ui.label(label)} ${detail}`);

    };

    const note = (label: string, detail: string): void => {

        ctx.print(`${theme.warning('!')} ${ui.label(label)} ${detail}`);

    };

    // Configuration
    const problems = validateResolvedConfig(config);

    if (configPath === null) {

        note('Configuration file', "not found, using defaults (run 'pgbranch init' to create one)");

    }
    else if (problems.length === 0) {

        row(true, 'Configuration file', `found and valid: ${configPath}`);

    }
    else {

        row(false, 'Configuration file', problems.map((p) => `${p.field}: ${p.message}`).join('; '));

    }

    // Server
    const [manager, connectErr] = await attempt(() => ctx.connect(config));

    if (connectErr) {

        row(false, 'PostgreSQL connection', `failed: ${connectErr.message}`);
        row(false, `Template database '${config.database.template_database}'`, 'not checked');
        row(false, 'Database permissions', 'not checked');

    }
    else {

        const connected = await manager.testConnection();

        row(connected, 'PostgreSQL connection', connected ? 'connected' : 'server did not answer');

        const [exists, existsErr] = await attempt(() => manager.databaseExists(config.database.template_database));

        row(
            exists === true,
            `Template database '${config.database.template_database}'`,
            existsErr ? `error: ${existsErr.message}` : exists ? 'found' : 'not found',
        );

        const [canCreate, permErr] = await attempt(() => manager.canCreateDatabases());

        row(
            canCreate === true,
            'Database permissions',
            permErr ? `error: ${permErr.message}` : canCreate ? 'can create databases' : 'cannot create databases',
        );

        const [, closeErr] = await attempt(() => manager.close());

        if (closeErr) {

            note('PostgreSQL connection', `close failed: ${closeErr.message}`);

        }

    }

    // Repository
    if (ctx.git) {

        row(true, 'Git repository', ctx.git.root);

        if (hooksInstalled(ctx.git.getHooksDir())) {

            row(true, 'Git hooks', 'installed');

        }
        else {

            note('Git hooks', "not installed (run 'pgbranch install-hooks')");

        }

    }
    else {

        row(false, 'Git repository', 'not a Git repository');

    }

    const filter = config.git.branch_filter_regex;

    if (filter !== null) {

        const compiled = compilePattern(filter);

        row(
            !(compiled instanceof Error),
            'Branch filter regex',
            compiled instanceof Error ? `invalid: ${compiled.message}` : 'valid',
        );

    }

    ctx.print();

    if (failed) {

        ctx.print(status.error('Some checks failed. Please address the issues above.'));

        return 1;

    }

    ctx.print(status.success('All checks passed! pgbranch is ready to use.'));

    return 0;

}

// ─────────────────────────────────────────────────────────────
// Hooks
// ─────────────────────────────────────────────────────────────

/**
 * install-hooks: write post-checkout and post-merge.
 */
export async function handleInstallHooks(_args: string[], flags: CliFlags, ctx: BaseContext): Promise<number> {

    if (!ctx.git) {

        ctx.print(status.error('Not a Git repository'));

        return 1;

    }

    const { installed, skipped } = installHooks(ctx.git.getHooksDir(), flags.force);

    for (const hook of skipped) {

        ctx.print(status.warning(`Skipped ${hook}: an existing hook was not written by pgbranch (use --force to replace it)`));

    }

    if (installed.length > 0) {

        ctx.print(status.success(`Installed Git hooks: ${installed.join(', ')}`));

    }

    return 0;

}

/**
 * uninstall-hooks: remove the hooks pgbranch wrote.
 */
export async function handleUninstallHooks(_args: string[], _flags: CliFlags, ctx: BaseContext): Promise<number> {

    if (!ctx.git) {

        ctx.print(status.error('Not a Git repository'));

        return 1;

    }

    const removed = uninstallHooks(ctx.git.getHooksDir());

    ctx.print(removed.length > 0
        ? status.success(`Uninstalled Git hooks: ${removed.join(', ')}`)
        : status.info('No pgbranch hooks installed'));

    return 0;

}

/**
 * git-hook: called by the installed hooks after a checkout.
 */
export async function handleGitHookCommand(_args: string[], _flags: CliFlags, ctx: CommandContext): Promise<number> {

    const result = await handleGitHook(toSyncContext(ctx));

    if (result.switch) {

        printSwitch(ctx, result.switch);

    }

    return 0;

}

// ─────────────────────────────────────────────────────────────
// Branch databases
// ─────────────────────────────────────────────────────────────

/**
 * create <branch>: create a branch database and run post commands.
 */
export async function handleCreate(args: string[], _flags: CliFlags, ctx: CommandContext): Promise<number> {

    const branch = requireBranchArg(args, ctx, 'create');

    if (branch === null) return 1;

    const syncCtx = toSyncContext(ctx);
    const result = await withDatabase(ctx, (manager) => manager.createDatabaseBranch(branch));

    ctx.print(result.created
        ? status.success(`Created database branch: ${branch} (${result.database})`)
        : status.info(`Database ${result.database} already exists`));

    printOutcomes(ctx, await runPostCommands(syncCtx, branch));

    return 0;

}

/**
 * delete <branch>: drop a branch database.
 */
export async function handleDelete(args: string[], _flags: CliFlags, ctx: CommandContext): Promise<number> {

    const branch = requireBranchArg(args, ctx, 'delete');

    if (branch === null) return 1;

    const result = await withDatabase(ctx, (manager) => manager.dropDatabaseBranch(branch));

    ctx.print(result.dropped
        ? status.success(`Deleted database branch: ${branch} (${result.database})`)
        : status.info(`Database ${result.database} does not exist`));

    return 0;

}

/**
 * list: branch databases, the one in use marked with `*`.
 *
 * When the server cannot be reached the template and the current branch
 * are still shown.
 */
export async function handleList(_args: string[], _flags: CliFlags, ctx: CommandContext): Promise<number> {

    const syncCtx = toSyncContext(ctx);
    const current = resolveCurrentBranch(syncCtx);
    const template = `${ctx.config.database.template_database} (main)`;

    const [branches, err] = await attempt(() => withDatabase(ctx, (manager) => manager.listDatabaseBranches()));

    if (err) {

        ctx.print(status.warning(`Could not list database branches: ${err.message}`));

    }

    ctx.print(ui.heading('PostgreSQL branches:'));
    ctx.print(current === MAIN_BRANCH_SENTINEL ? ui.current(template) : ui.entry(template));

    if (err) {

        if (current !== MAIN_BRANCH_SENTINEL) {

            ctx.print(ui.current(current));

        }

        return 0;

    }

    for (const branch of branches) {

        ctx.print(branch === current ? ui.current(branch) : ui.entry(branch));

    }

    return 0;

}

/**
 * switch [<branch>] [--template]
 *
 * Without a branch the list is shown and a name is asked for.
 */
export async function handleSwitch(args: string[], flags: CliFlags, ctx: CommandContext): Promise<number> {

    const syncCtx = toSyncContext(ctx);

    if (flags.template) {

        printSwitch(ctx, await switchToMain(syncCtx));

        return 0;

    }

    let branch = args[0] ?? null;

    if (branch === null) {

        await handleList([], flags, ctx);

        branch = await ctx.ask('Branch to switch to: ');

    }

    if (branch === null) {

        ctx.print(status.error('No branch given. Usage: pgbranch switch <branch>'));

        return 1;

    }

    const result = isMainBranch(branch, ctx.config)
        ? await switchToMain(syncCtx)
        : await switchToBranch(syncCtx, branch);

    printSwitch(ctx, result);

    return 0;

}

/**
 * cleanup [--max-count N]: keep the newest branch databases.
 */
export async function handleCleanup(_args: string[], flags: CliFlags, ctx: CommandContext): Promise<number> {

    const max = flags.maxCount ?? ctx.config.behavior.max_branches ?? DEFAULT_MAX_BRANCHES;
    const dropped = await withDatabase(ctx, (manager) => manager.cleanupOldBranches(max));

    for (const database of dropped) {

        ctx.print(status.info(`Dropped ${database}`));

    }

    ctx.print(status.success(`Cleaned up old database branches, keeping the ${max} most recent`));

    return 0;

}

// ─────────────────────────────────────────────────────────────
// Post commands
// ─────────────────────────────────────────────────────────────

/**
 * templates [<branch>]: variables available to post commands.
 */
export async function handleTemplates(args: string[], _flags: CliFlags, ctx: CommandContext): Promise<number> {

    const branch = args[0] ?? EXAMPLE_BRANCH;
    const variables = listTemplateVariables(createTemplateContext(branch, ctx.config));
    const width = Math.max(...variables.map((v) => v.name.length)) + 2;

    ctx.print(ui.heading(`Template variables for branch: ${branch}`));

    for (const variable of variables) {

        const name = `{${variable.name}}`.padEnd(width);

        ctx.print(`  ${name} ${variable.value.padEnd(24)} ${ui.label(variable.description)}`);

    }

    ctx.print();
    ctx.print(ui.label('Example: command: "psql -d {db_name} -c \'SELECT 1\'"'));

    return 0;

}

/**
 * test-post-commands <branch>: run post commands without the database.
 */
export async function handleTestPostCommands(args: string[], _flags: CliFlags, ctx: CommandContext): Promise<number> {

    const branch = requireBranchArg(args, ctx, 'test-post-commands');

    if (branch === null) return 1;

    ctx.print(status.test(`Testing post-commands for branch: ${branch}`));

    if (ctx.config.post_commands.length === 0) {

        ctx.print(status.info('No post-commands configured'));

        return 0;

    }

    printOutcomes(ctx, await runPostCommands(toSyncContext(ctx), branch));

    return 0;

}

/**
 * test-switch <branch>: show what a switch would do, run post commands,
 * touch neither local state nor the database.
 */
export async function handleTestSwitch(args: string[], _flags: CliFlags, ctx: CommandContext): Promise<number> {

    const name = requireBranchArg(args, ctx, 'test-switch');

    if (name === null) return 1;

    const branch = getNormalizedBranchName(name);

    ctx.print(status.test(`Testing switch to PostgreSQL branch: ${branch}`));
    ctx.print(status.info(`Database: ${getDatabaseName(branch, ctx.config)}`));

    printOutcomes(ctx, await runPostCommands(toSyncContext(ctx), branch));

    return 0;

}
