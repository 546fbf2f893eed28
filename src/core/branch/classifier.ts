/**
 * Branch classification.
 *
 * Decides whether a git branch should get its own database and whether
 * checking it out should switch databases. An invalid filter regex
 * answers false for both.
 */
import { MAIN_BRANCH_SENTINEL } from '../config/defaults.js';
import { compilePattern } from '../config/patterns.js';
import type { BaseConfig, GitConfig } from '../config/types.js';
import { observer } from '../observer.js';

/**
 * What a branch event should do.
 *
 * - `main` - switch to the template database
 * - `ignore` - leave everything as it is
 * - `switch` - the branch is switchable but gets no database of its own
 * - `create` - create the branch database if needed, then switch
 */
export type BranchAction = 'main' | 'ignore' | 'switch' | 'create';

/**
 * Exclusion and filter checks shared by creation and switching.
 */
function passesBranchFilter(name: string, git: GitConfig): boolean {

    if (git.exclude_branches.includes(name)) {

        return false;

    }

    const filter = git.branch_filter_regex;

    if (filter === null) {

        return true;

    }

    const regex = compilePattern(filter);

    if (regex instanceof Error) {

        observer.emit('branch:filter-invalid', { filter, error: regex.message });

        return false;

    }

    return regex.test(name);

}

/**
 * Whether a branch should get its own database.
 *
 * @example
 * ```typescript
 * shouldCreateBranch('feature/login', config)  // true with defaults
 * shouldCreateBranch('main', config)           // false, excluded
 * ```
 */
export function shouldCreateBranch(name: string, config: BaseConfig): boolean {

    if (!config.git.auto_create_on_branch) {

        return false;

    }

    return passesBranchFilter(name, config.git);

}

/**
 * Whether checking out a branch should switch databases.
 *
 * The main branch always passes when switching is enabled, whatever the
 * exclusions and filter say.
 */
export function shouldSwitchOnBranch(name: string, config: BaseConfig): boolean {

    if (!config.git.auto_switch_on_branch) {

        return false;

    }

    if (name === config.git.main_branch) {

        return true;

    }

    return passesBranchFilter(name, config.git);

}

/**
 * Whether a logical branch stands for the template database.
 */
export function isMainBranch(name: string, config: BaseConfig): boolean {

    return name === MAIN_BRANCH_SENTINEL || name === config.git.main_branch;

}

/**
 * Classify a git branch event.
 *
 * @example
 * ```typescript
 * classifyBranch('main', config)          // 'main'
 * classifyBranch('feature/x', config)     // 'create'
 * classifyBranch('master', config)        // 'ignore' (excluded)
 * ```
 */
export function classifyBranch(name: string, config: BaseConfig): BranchAction {

    if (!shouldSwitchOnBranch(name, config)) {

        return 'ignore';

    }

    if (name === config.git.main_branch) {

        return 'main';

    }

    return shouldCreateBranch(name, config) ? 'create' : 'switch';

}
