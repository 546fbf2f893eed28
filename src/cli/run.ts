/**
 * Command execution.
 *
 * Starts the logger on stderr, reads the configuration the command needs
 * and turns thrown errors into exit code 1.
 *
 * @example
 * ```typescript
 * const exitCode = await runCommand(
 *     { command: 'switch', args: ['feature/login'], flags },
 *     createCliEnvironment(),
 * )
 * ```
 */
import { attempt } from '@logosdx/utils'

import {
    DatabaseManager,
    GitRepository,
    Logger,
    getLocalStateStore,
    getLogLevel,
    isCi,
    loadEffectiveConfig,
} from '../core/index.js'
import { status } from '../core/theme.js'
import { COMMANDS } from './commands.js'
import { NO_CONFIG_MESSAGE } from './handlers.js'
import { ask, promptPassword } from './prompt.js'
import type { BaseContext, CliEnvironment, ParsedCli } from './types.js'


/**
 * Collaborators of a real process.
 */
export function createCliEnvironment(overrides: Partial<CliEnvironment> = {}): CliEnvironment {

    const env = overrides.env ?? process.env
    const prompter = overrides.promptPassword ?? promptPassword

    return {
        cwd: process.cwd(),
        stdout: process.stdout,
        stderr: process.stderr,
        openGit: (cwd) => GitRepository.open(cwd),
        connect: (config) => DatabaseManager.connect(config, { env, prompter }),
        state: getLocalStateStore(),
        ask,
        ...overrides,
        env,
        promptPassword: prompter,
    }
}


/**
 * Run one command.
 *
 * @returns Exit code (0 for success, 1 for errors)
 */
export async function runCommand(parsed: ParsedCli, environment: CliEnvironment): Promise<number> {

    const logger = new Logger({
        config: { level: getLogLevel(environment.env), timestamps: isCi(environment.env) },
        console: environment.stderr,
    })

    logger.start()

    const [exitCode, err] = await attempt(() => execute(parsed, environment))

    logger.stop()

    if (err) {

        environment.stderr.write(status.error(err.message) + '\n')

        return 1
    }

    return exitCode
}


async function execute({ command, args, flags }: ParsedCli, environment: CliEnvironment): Promise<number> {

    const base: BaseContext = {
        ...environment,
        git: environment.openGit(environment.cwd),
        print: (line = '') => {

            environment.stdout.write(line + '\n')
        },
    }

    const spec = COMMANDS[command]

    if (spec.config === 'none') {

        return spec.handler(args, flags, base)
    }

    const loaded = loadEffectiveConfig({ cwd: environment.cwd, env: environment.env, git: base.git })

    if (spec.config === 'required' && loaded.configPath === null) {

        environment.stderr.write(status.error(NO_CONFIG_MESSAGE) + '\n')

        return 1
    }

    return spec.handler(args, flags, { ...base, loaded, config: loaded.effective.merged() })
}
