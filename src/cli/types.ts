/**
 * CLI type definitions.
 *
 * Commands, parsed flags and the context every command handler runs in.
 */
import type { Writable } from 'node:stream'

import type {
    BaseConfig,
    CommandRunner,
    DatabaseManager,
    GitRepository,
    LoadedEffectiveConfig,
    LocalStateStore,
    PasswordPrompter,
} from '../core/index.js'


/**
 * Every command of the binary.
 */
export type CommandName =
    | 'init'
    | 'create'
    | 'delete'
    | 'list'
    | 'switch'
    | 'cleanup'
    | 'config'
    | 'check'
    | 'install-hooks'
    | 'uninstall-hooks'
    | 'git-hook'
    | 'templates'
    | 'test-post-commands'
    | 'test-switch'
    | 'help'


/**
 * Flags accepted on the command line.
 */
export interface CliFlags {

    /** init: overwrite an existing file; install-hooks: replace foreign hooks */
    force: boolean

    /** init: prefill the database section from docker compose */
    fromCompose: boolean

    /** switch: go back to the template database */
    template: boolean

    /** cleanup: number of branch databases to keep */
    maxCount?: number
}


/**
 * Parsed invocation.
 */
export interface ParsedCli {

    command: CommandName
    args: string[]
    flags: CliFlags
}


/**
 * Process-level collaborators. Tests replace the ones that reach outside
 * the process.
 */
export interface CliEnvironment {

    cwd: string
    env: NodeJS.ProcessEnv

    /** Command output */
    stdout: Writable

    /** Log lines and errors */
    stderr: Writable

    /** Opens the repository at a directory, null outside one */
    openGit: (cwd: string) => GitRepository | null

    /** Connects to the server of a configuration */
    connect: (config: BaseConfig) => Promise<DatabaseManager>

    state: LocalStateStore

    /** Asks a question on the terminal, null without an answer */
    ask: (question: string) => Promise<string | null>

    /** Reads a password without echo */
    promptPassword: PasswordPrompter

    runner?: CommandRunner
}


/**
 * What every handler sees.
 */
export interface BaseContext extends CliEnvironment {

    git: GitRepository | null

    /** Write one line to stdout */
    print: (line?: string) => void
}


/**
 * Context of the commands that read the configuration.
 */
export interface CommandContext extends BaseContext {

    loaded: LoadedEffectiveConfig

    /** `loaded.effective.merged()` */
    config: BaseConfig
}


/**
 * Runs a command. Resolves the exit code.
 */
export type CommandHandler<C extends BaseContext = CommandContext> = (
    args: string[],
    flags: CliFlags,
    ctx: C
) => Promise<number>


/**
 * Registry entry of a command.
 *
 * `config: 'none'` commands run before any configuration is read, so a
 * malformed file cannot stop them.
 */
export type CommandSpec = {

    summary: string
    usage: string
} & (
    | { config: 'none'; handler: CommandHandler<BaseContext> }
    | { config: 'optional' | 'required'; handler: CommandHandler }
)
