/**
 * Branch sync: git hook handling and logical branch switching.
 */
export { handleGitHook } from './hook.js';
export {
    detectDefaultBranch,
    resolveCurrentBranch,
    runPostCommands,
    switchToBranch,
    switchToMain,
} from './switch.js';
export type { HookAction, HookResult, SwitchResult, SyncContext } from './types.js';
