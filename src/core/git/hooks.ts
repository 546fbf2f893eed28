/**
 * Git hook installation.
 *
 * pgbranch installs `post-checkout` and `post-merge` hooks that call
 * `pgbranch git-hook`. Hooks are recognised by a marker line; foreign
 * hooks are never removed and only replaced when forced.
 */
import { chmodSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'

import { attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'


export const HOOK_NAMES = ['post-checkout', 'post-merge'] as const

export type HookName = (typeof HOOK_NAMES)[number]

/**
 * Marker line identifying hooks written by pgbranch.
 */
export const HOOK_MARKER = 'pgbranch auto-generated hook'

const HOOK_SCRIPT = `#!/bin/sh
# ${HOOK_MARKER}
# Switches the PostgreSQL branch database when the git branch changes.

# post-checkout: $1=previous HEAD, $2=new HEAD, $3=checkout type (1=branch, 0=file)
if [ "$3" = "0" ]; then
    exit 0
fi

PREV_BRANCH=\`git reflog | awk 'NR==1{ print $6; exit }'\`
NEW_BRANCH=\`git reflog | awk 'NR==1{ print $8; exit }'\`

if [ "$PREV_BRANCH" = "$NEW_BRANCH" ]; then
    exit 0
fi

if command -v pgbranch >/dev/null 2>&1; then
    pgbranch git-hook
else
    echo "pgbranch not found in PATH, skipping database branch switch"
fi
`


/**
 * Result of a hook installation.
 */
export interface HookInstallResult {

    installed: HookName[]

    /** Existing hooks not written by pgbranch, left in place */
    skipped: HookName[]
}


/**
 * The script written for every hook.
 */
export function getHookScript(): string {

    return HOOK_SCRIPT
}


/**
 * Whether a hook file was written by pgbranch.
 */
export function isPgbranchHook(path: string): boolean {

    if (!existsSync(path)) return false

    const [content] = attemptSync(() => readFileSync(path, 'utf8'))

    return content?.includes(HOOK_MARKER) ?? false
}


/**
 * Install the hooks.
 *
 * @param force - Replace hooks that pgbranch did not write
 *
 * @example
 * ```typescript
 * const { installed, skipped } = installHooks(repo.getHooksDir())
 * ```
 */
export function installHooks(hooksDir: string, force = false): HookInstallResult {

    mkdirSync(hooksDir, { recursive: true })

    const result: HookInstallResult = { installed: [], skipped: [] }

    for (const hook of HOOK_NAMES) {

        const path = join(hooksDir, hook)

        if (existsSync(path) && !isPgbranchHook(path) && !force) {

            result.skipped.push(hook)
            continue
        }

        writeFileSync(path, HOOK_SCRIPT, 'utf8')
        chmodSync(path, 0o755)
        result.installed.push(hook)
    }

    observer.emit('hook:installed', { hooksDir, hooks: [...result.installed] })

    return result
}


/**
 * Remove the hooks pgbranch wrote. Returns the names removed.
 */
export function uninstallHooks(hooksDir: string): HookName[] {

    const removed: HookName[] = []

    for (const hook of HOOK_NAMES) {

        const path = join(hooksDir, hook)

        if (isPgbranchHook(path)) {

            rmSync(path)
            removed.push(hook)
        }
    }

    observer.emit('hook:uninstalled', { hooksDir, hooks: [...removed] })

    return removed
}


/**
 * Whether every pgbranch hook is installed.
 */
export function hooksInstalled(hooksDir: string): boolean {

    return HOOK_NAMES.every((hook) => isPgbranchHook(join(hooksDir, hook)))
}
