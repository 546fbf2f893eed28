/**
 * Git module - branch queries and hook management.
 */
export { GitRepository } from './repository.js';

export {
    HOOK_NAMES,
    HOOK_MARKER,
    getHookScript,
    isPgbranchHook,
    installHooks,
    uninstallHooks,
    hooksInstalled,
    type HookName,
    type HookInstallResult,
} from './hooks.js';
