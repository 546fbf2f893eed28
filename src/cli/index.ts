#!/usr/bin/env node
/**
 * CLI entry point for pgbranch.
 *
 * Parses command line arguments with meow and runs one command.
 *
 * @example
 * ```bash
 * pgbranch init --from-compose
 * pgbranch switch feature/login
 * pgbranch cleanup --max-count 5
 * ```
 */
import meow from 'meow'

import { status } from '../core/theme.js'
import { HELP_TEXT, isCommandName } from './commands.js'
import { createCliEnvironment, runCommand } from './run.js'
import type { ParsedCli } from './types.js'


/**
 * Parse CLI arguments with meow.
 *
 * @returns null for an unknown command
 */
function parseCli(): ParsedCli | null {

    const cli = meow(HELP_TEXT, {
        importMeta: import.meta,
        flags: {
            force: {
                type: 'boolean',
                shortFlag: 'f',
                default: false,
            },
            fromCompose: {
                type: 'boolean',
                default: false,
            },
            template: {
                type: 'boolean',
                default: false,
            },
            maxCount: {
                type: 'number',
            },
        },
    })

    const [command = 'help', ...args] = cli.input

    if (!isCommandName(command)) {

        process.stderr.write(status.error(`Unknown command '${command}'. Run 'pgbranch help' for the list.`) + '\n')

        return null
    }

    return {
        command,
        args,
        flags: {
            force: cli.flags.force,
            fromCompose: cli.flags.fromCompose,
            template: cli.flags.template,
            maxCount: cli.flags.maxCount,
        },
    }
}


/**
 * Main entry point.
 */
async function main(): Promise<void> {

    const parsed = parseCli()

    if (!parsed) {

        process.exitCode = 1

        return
    }

    process.exitCode = await runCommand(parsed, createCliEnvironment())
}


main().catch((error: unknown) => {

    console.error('Fatal error:', error)
    process.exit(1)
})
