/**
 * Post command types.
 */

/**
 * Options passed to a CommandRunner.
 */
export interface CommandRunOptions {
    cwd: string;
    env: NodeJS.ProcessEnv;
}

/**
 * Outcome of a shell command.
 */
export interface CommandRunResult {

    /** Null when the process was killed by a signal */
    exitCode: number | null;
    signal: string | null;
}

/**
 * Runs a shell command line.
 *
 * The default runner spawns a shell with inherited stdio; tests inject a
 * recording fake.
 */
export type CommandRunner = (command: string, options: CommandRunOptions) => Promise<CommandRunResult>;

/**
 * What happened to one post command.
 */
export type PostCommandStatus = 'completed' | 'skipped' | 'failed';

/**
 * Per-command outcome of a run.
 */
export interface PostCommandOutcome {
    name: string;
    status: PostCommandStatus;

    /** Skip reason or failure message */
    detail?: string;
}

/**
 * Error thrown when a post command fails and may not be skipped.
 */
export class PostCommandError extends Error {

    constructor(
        message: string,
        public readonly command: string,
        cause?: Error,
    ) {

        super(message, { cause });
        this.name = 'PostCommandError';

    }

}
