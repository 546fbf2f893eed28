/**
 * Default shell command runner.
 */
import { spawn } from 'child_process';

import type { CommandRunner, CommandRunResult } from './types.js';

/**
 * Run a command line through the system shell with inherited stdio.
 *
 * Resolves when the process exits; rejects only when it cannot start.
 *
 * @example
 * ```typescript
 * const { exitCode } = await shellCommandRunner('make migrate', {
 *     cwd: projectRoot,
 *     env: process.env,
 * })
 * ```
 */
export const shellCommandRunner: CommandRunner = (command, options) => {

    return new Promise<CommandRunResult>((resolve, reject) => {

        const child = spawn(command, {
            cwd: options.cwd,
            env: options.env,
            stdio: 'inherit',
            shell: true,
        });

        child.on('error', reject);

        child.on('close', (code, signal) => {

            resolve({ exitCode: code, signal });

        });

    });

};
