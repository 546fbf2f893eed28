/**
 * State module exports.
 *
 * Provides LocalStateStore and singleton helpers.
 */
import { LocalStateStore } from './manager.js';
import type { LocalStateStoreOptions } from './manager.js';

export { LocalStateStore, LocalStateError, getDefaultStateDir } from './manager.js';
export type { LocalStateStoreOptions } from './manager.js';
export * from './types.js';

let instance: LocalStateStore | null = null;

/**
 * Get or create the LocalStateStore singleton.
 *
 * @example
 * ```typescript
 * const store = getLocalStateStore()
 * const branch = store.getCurrentBranch(configPath)
 * ```
 */
export function getLocalStateStore(options?: LocalStateStoreOptions): LocalStateStore {

    if (!instance) {

        instance = new LocalStateStore(options);

    }

    return instance;

}

/**
 * Reset the singleton (for testing).
 */
export function resetLocalStateStore(): void {

    instance = null;

}
