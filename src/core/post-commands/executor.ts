/**
 * Post command executor.
 *
 * Runs the configured post commands after a branch switch, in order,
 * with `{name}` placeholders filled from the branch's template context.
 */
import { resolve } from 'path';

import { attempt, attemptSync } from '@logosdx/utils';

import type { PostCommand, ReplaceCommand, ShellCommand } from '../config/types.js';
import { observer } from '../observer.js';
import type { TemplateContext } from '../template/context.js';
import { substituteTemplateVariables } from '../template/substitute.js';
import { evaluateCondition } from './conditions.js';
import { applyReplaceCommand } from './replace.js';
import { shellCommandRunner } from './runner.js';
import type { CommandRunner, PostCommandOutcome } from './types.js';
import { PostCommandError } from './types.js';

/**
 * Options for PostCommandExecutor.
 */
export interface PostCommandExecutorOptions {

    /** Directory relative paths resolve against (the base config's) */
    baseDir: string;

    /** Shell runner (defaults to spawning a shell) */
    runner?: CommandRunner;

    /** Environment commands inherit (defaults to process.env) */
    env?: NodeJS.ProcessEnv;
}

function isReplaceCommand(command: ShellCommand | ReplaceCommand): command is ReplaceCommand {

    return 'action' in command;

}

/**
 * Display name of a post command.
 *
 * @example
 * ```typescript
 * getPostCommandName('npm run migrate')                 // 'npm run migrate'
 * getPostCommandName({ name: 'Migrate', command: 'x' }) // 'Migrate'
 * getPostCommandName({ action: 'replace', file: '.env', ... })  // 'Replace in .env'
 * ```
 */
export function getPostCommandName(command: PostCommand): string {

    if (typeof command === 'string') return command;

    if (command.name) return command.name;

    return isReplaceCommand(command) ? `Replace in ${command.file}` : command.command;

}

/**
 * Runs post commands for one branch.
 *
 * @example
 * ```typescript
 * const executor = new PostCommandExecutor(createTemplateContext(branch, config), {
 *     baseDir: dirname(configPath),
 * })
 *
 * await executor.executeAll(config.post_commands)
 * ```
 */
export class PostCommandExecutor {

    readonly #context: TemplateContext;
    readonly #baseDir: string;
    readonly #runner: CommandRunner;
    readonly #env: NodeJS.ProcessEnv;

    constructor(context: TemplateContext, options: PostCommandExecutorOptions) {

        this.#context = context;
        this.#baseDir = options.baseDir;
        this.#runner = options.runner ?? shellCommandRunner;
        this.#env = options.env ?? process.env;

    }

    get context(): TemplateContext {

        return this.#context;

    }

    /**
     * Run every command in order.
     *
     * @throws PostCommandError on the first failure of a command without
     *         `continue_on_error`
     */
    async executeAll(commands: readonly PostCommand[]): Promise<PostCommandOutcome[]> {

        const outcomes: PostCommandOutcome[] = [];

        for (const [index, command] of commands.entries()) {

            outcomes.push(await this.#execute(command, index, commands.length));

        }

        return outcomes;

    }

    async #execute(command: PostCommand, index: number, total: number): Promise<PostCommandOutcome> {

        const name = getPostCommandName(command);
        const condition = typeof command === 'string' ? undefined : command.condition;

        if (condition) {

            const holds = evaluateCondition(condition, { baseDir: this.#baseDir, env: this.#env });

            if (holds === null) {

                const reason = `unknown condition "${condition}"`;

                observer.emit('post-command:skipped', { name, reason });

                return { name, status: 'skipped', detail: reason };

            }

            if (!holds) {

                const reason = `condition "${condition}" not met`;

                observer.emit('post-command:skipped', { name, reason });

                return { name, status: 'skipped', detail: reason };

            }

        }

        observer.emit('post-command:start', { name, index, total });

        const start = performance.now();
        const error = await this.#run(command);

        if (error) {

            const continueOnError = typeof command !== 'string' && command.continue_on_error === true;

            observer.emit('post-command:failed', { name, error: error.message, continued: continueOnError });

            if (!continueOnError) {

                throw new PostCommandError(`Post command "${name}" failed: ${error.message}`, name, error);

            }

            return { name, status: 'failed', detail: error.message };

        }

        observer.emit('post-command:complete', { name, durationMs: performance.now() - start });

        return { name, status: 'completed' };

    }

    /**
     * Run one command. Resolves the failure, or null on success.
     */
    async #run(command: PostCommand): Promise<Error | null> {

        if (typeof command !== 'string' && isReplaceCommand(command)) {

            const [, err] = attemptSync(() => applyReplaceCommand(command, this.#context, this.#baseDir));

            return err;

        }

        const shell: ShellCommand = typeof command === 'string' ? { command } : command;
        const line = substituteTemplateVariables(shell.command, this.#context);
        const cwd = shell.working_dir
            ? resolve(this.#baseDir, substituteTemplateVariables(shell.working_dir, this.#context))
            : this.#baseDir;

        const env: NodeJS.ProcessEnv = { ...this.#env };

        for (const [key, value] of Object.entries(shell.environment ?? {})) {

            env[key] = substituteTemplateVariables(value, this.#context);

        }

        const [result, err] = await attempt(() => this.#runner(line, { cwd, env }));

        if (err) return err;

        if (result.exitCode === 0) return null;

        return result.exitCode === null
            ? new Error(`terminated by signal ${result.signal ?? 'unknown'}`)
            : new Error(`exited with code ${result.exitCode}`);

    }

}
