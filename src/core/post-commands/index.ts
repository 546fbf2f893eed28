/**
 * Post command module.
 *
 * Runs shell commands and file edits after a branch switch.
 */
export { PostCommandExecutor, getPostCommandName, type PostCommandExecutorOptions } from './executor.js';
export { evaluateCondition, type ConditionContext } from './conditions.js';
export { applyReplaceCommand, replaceInContent, type ReplaceOutcome } from './replace.js';
export { shellCommandRunner } from './runner.js';
export {
    PostCommandError,
    type CommandRunner,
    type CommandRunOptions,
    type CommandRunResult,
    type PostCommandOutcome,
    type PostCommandStatus,
} from './types.js';
