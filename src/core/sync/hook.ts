/**
 * Git hook handling.
 *
 * Called by the installed `post-checkout` and `post-merge` hooks after
 * git moved HEAD.
 */
import { classifyBranch } from '../branch/classifier.js';
import { observer } from '../observer.js';
import { switchToBranch, switchToMain } from './switch.js';
import type { HookResult, SyncContext } from './types.js';

/**
 * React to a checkout.
 *
 * | Situation                                | Action          |
 * |------------------------------------------|-----------------|
 * | hooks skipped, pgbranch disabled         | `skipped`       |
 * | detached HEAD or no repository           | `no-branch`     |
 * | switching not wanted for the branch      | `ignored`       |
 * | the main git branch                      | `main`          |
 * | switching wanted, creation not           | `not-creatable` |
 * | otherwise                                | `switched`      |
 *
 * @example
 * ```typescript
 * const { action } = await handleGitHook(ctx)
 * ```
 */
export async function handleGitHook(ctx: SyncContext): Promise<HookResult> {

    if (ctx.effective.skipHooks) {

        observer.emit('branch:skipped', { branch: '*', reason: 'hooks-skipped' });

        return { action: 'skipped', branch: null };

    }

    if (ctx.effective.shouldExitEarly()) {

        return { action: 'skipped', branch: null };

    }

    const branch = ctx.git?.getCurrentBranch() ?? null;

    if (branch === null) {

        return { action: 'no-branch', branch: null };

    }

    observer.emit('hook:triggered', { branch });

    switch (classifyBranch(branch, ctx.config)) {

    case 'ignore':
        observer.emit('branch:skipped', { branch, reason: 'filtered' });

        return { action: 'ignored', branch };

    case 'main':
        return { action: 'main', branch, switch: await switchToMain(ctx) };

    case 'switch':
        observer.emit('branch:skipped', { branch, reason: 'not-creatable' });

        return { action: 'not-creatable', branch };

    case 'create':
        return { action: 'switched', branch, switch: await switchToBranch(ctx, branch) };

    }

}
