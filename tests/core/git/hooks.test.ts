/**
 * Hook installation tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs'
import { join } from 'path'

import {
    HOOK_MARKER,
    getHookScript,
    hooksInstalled,
    installHooks,
    isPgbranchHook,
    uninstallHooks,
} from '../../../src/core/git/hooks.js'


describe('git: hooks', () => {

    let hooksDir: string
    let tempDir: string

    beforeEach(() => {

        tempDir = mkdtempSync(join(process.cwd(), 'tmp', 'pgbranch-test-'))
        hooksDir = join(tempDir, '.git', 'hooks')
    })

    afterEach(() => {

        rmSync(tempDir, { recursive: true, force: true })
    })

    it('should write both hooks as executables', () => {

        const result = installHooks(hooksDir)

        expect(result).toEqual({ installed: ['post-checkout', 'post-merge'], skipped: [] })

        for (const hook of ['post-checkout', 'post-merge']) {

            const path = join(hooksDir, hook)

            expect(readFileSync(path, 'utf8')).toBe(getHookScript())
            expect(statSync(path).mode & 0o111).not.toBe(0)
        }

        expect(hooksInstalled(hooksDir)).toBe(true)
    })

    it('should call pgbranch git-hook and skip file checkouts', () => {

        const script = getHookScript()

        expect(script.startsWith('#!/bin/sh\n')).toBe(true)
        expect(script).toContain(`# ${HOOK_MARKER}`)
        expect(script).toContain('    pgbranch git-hook\n')
        expect(script).toContain('if [ "$3" = "0" ]; then')
    })

    it('should leave a foreign hook alone unless forced', () => {

        installHooks(hooksDir)
        writeFileSync(join(hooksDir, 'post-merge'), '#!/bin/sh\necho custom\n')

        expect(installHooks(hooksDir)).toEqual({ installed: ['post-checkout'], skipped: ['post-merge'] })
        expect(readFileSync(join(hooksDir, 'post-merge'), 'utf8')).toBe('#!/bin/sh\necho custom\n')
        expect(hooksInstalled(hooksDir)).toBe(false)

        expect(installHooks(hooksDir, true)).toEqual({ installed: ['post-checkout', 'post-merge'], skipped: [] })
        expect(isPgbranchHook(join(hooksDir, 'post-merge'))).toBe(true)
    })

    it('should only remove its own hooks', () => {

        installHooks(hooksDir)
        writeFileSync(join(hooksDir, 'post-merge'), '#!/bin/sh\necho custom\n')

        expect(uninstallHooks(hooksDir)).toEqual(['post-checkout'])
        expect(existsSync(join(hooksDir, 'post-checkout'))).toBe(false)
        expect(existsSync(join(hooksDir, 'post-merge'))).toBe(true)
    })

    it('should remove nothing from an empty directory', () => {

        expect(uninstallHooks(hooksDir)).toEqual([])
        expect(hooksInstalled(hooksDir)).toBe(false)
        expect(isPgbranchHook(join(hooksDir, 'post-checkout'))).toBe(false)
    })
})
