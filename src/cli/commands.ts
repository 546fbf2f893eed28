/**
 * Command registry and help text.
 */
import { status, ui } from '../core/theme.js'

import {
    handleCheck,
    handleCleanup,
    handleConfig,
    handleCreate,
    handleDelete,
    handleGitHookCommand,
    handleInit,
    handleInstallHooks,
    handleList,
    handleSwitch,
    handleTemplates,
    handleTestPostCommands,
    handleTestSwitch,
    handleUninstallHooks,
} from './handlers.js'
import type { BaseContext, CliFlags, CommandName, CommandSpec } from './types.js'


/**
 * help [<command>]
 */
async function handleHelp(args: string[], _flags: CliFlags, ctx: BaseContext): Promise<number> {

    const topic = args[0]

    if (topic === undefined) {

        ctx.print(HELP_TEXT.trim())

        return 0
    }

    if (!isCommandName(topic)) {

        ctx.print(status.error(`Unknown command '${topic}'`))

        return 1
    }

    const spec = COMMANDS[topic]

    ctx.print(`${ui.heading(`pgbranch ${spec.usage}`)}`)
    ctx.print()
    ctx.print(`  ${spec.summary}`)

    return 0
}


export const COMMANDS: Record<CommandName, CommandSpec> = {
    'init': {
        summary: 'Write .pgbranch.yml in the current directory',
        usage: 'init [--force] [--from-compose]',
        config: 'none',
        handler: handleInit,
    },
    'create': {
        summary: 'Create the database of a branch from the template',
        usage: 'create <branch>',
        config: 'required',
        handler: handleCreate,
    },
    'delete': {
        summary: 'Drop the database of a branch',
        usage: 'delete <branch>',
        config: 'required',
        handler: handleDelete,
    },
    'list': {
        summary: 'List branch databases, the one in use marked with *',
        usage: 'list',
        config: 'required',
        handler: handleList,
    },
    'switch': {
        summary: 'Switch to a branch database, creating it when missing',
        usage: 'switch [<branch>] [--template]',
        config: 'required',
        handler: handleSwitch,
    },
    'cleanup': {
        summary: 'Drop all but the newest branch databases',
        usage: 'cleanup [--max-count N]',
        config: 'required',
        handler: handleCleanup,
    },
    'config': {
        summary: 'Show the effective configuration',
        usage: 'config',
        config: 'optional',
        handler: handleConfig,
    },
    'check': {
        summary: 'Check the configuration, the server and the repository',
        usage: 'check',
        config: 'optional',
        handler: handleCheck,
    },
    'install-hooks': {
        summary: 'Install the post-checkout and post-merge hooks',
        usage: 'install-hooks [--force]',
        config: 'none',
        handler: handleInstallHooks,
    },
    'uninstall-hooks': {
        summary: 'Remove the hooks pgbranch installed',
        usage: 'uninstall-hooks',
        config: 'none',
        handler: handleUninstallHooks,
    },
    'git-hook': {
        summary: 'Sync the database with the checked-out branch (run by the hooks)',
        usage: 'git-hook',
        config: 'required',
        handler: handleGitHookCommand,
    },
    'templates': {
        summary: 'Show the variables post commands can use',
        usage: 'templates [<branch>]',
        config: 'required',
        handler: handleTemplates,
    },
    'test-post-commands': {
        summary: 'Run the post commands for a branch without touching the database',
        usage: 'test-post-commands <branch>',
        config: 'required',
        handler: handleTestPostCommands,
    },
    'test-switch': {
        summary: 'Show what a switch would do without touching the database or local state',
        usage: 'test-switch <branch>',
        config: 'required',
        handler: handleTestSwitch,
    },
    'help': {
        summary: 'Show help for a command',
        usage: 'help [<command>]',
        config: 'none',
        handler: handleHelp,
    },
}


export function isCommandName(value: string): value is CommandName {

    return Object.hasOwn(COMMANDS, value)
}


const commandLines = Object.values(COMMANDS)
    .map((spec) => `    ${spec.usage.padEnd(36)}${spec.summary}`)
    .join('\n')


/**
 * Help text for the CLI.
 */
export const HELP_TEXT = `
  Usage
    $ pgbranch <command> [options]

  Commands
${commandLines}

  Options
    --force, -f         Overwrite (init) or replace foreign hooks (install-hooks)
    --from-compose      Take database settings from docker compose (init)
    --template          Switch to the template database (switch)
    --max-count <n>     Branch databases to keep (cleanup)
    --help, -h          Show this help
    --version           Show version

  Environment
    PGBRANCH_DISABLED, PGBRANCH_SKIP_HOOKS, PGBRANCH_AUTO_CREATE,
    PGBRANCH_AUTO_SWITCH, PGBRANCH_CURRENT_BRANCH_DISABLED,
    PGBRANCH_BRANCH_FILTER_REGEX, PGBRANCH_DISABLED_BRANCHES,
    PGBRANCH_DATABASE_{HOST,PORT,USER,PASSWORD,PREFIX}
    PGBRANCH_LOG_LEVEL=silent|error|warn|info|verbose, PGBRANCH_DEBUG=true

  Examples
    $ pgbranch init --from-compose
    $ pgbranch install-hooks
    $ pgbranch switch feature/login
    $ PGBRANCH_SKIP_HOOKS=true git checkout main
`
