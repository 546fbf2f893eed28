/**
 * Message formatting tests.
 */
import { describe, it, expect } from 'vitest'

import { formatEntry, generateMessage, serializeEntry } from '../../../src/core/logger/formatter.js'


describe('logger: formatter', () => {

    it('should use templates for known events', () => {

        expect(generateMessage('db:dropped', { database: 'pgbranch_x' })).toBe('Dropped database pgbranch_x')
        expect(generateMessage('env:loaded', { variables: ['PGBRANCH_DISABLED', 'PGBRANCH_DATABASE_HOST'] }))
            .toBe('Environment overrides: PGBRANCH_DISABLED, PGBRANCH_DATABASE_HOST')
        expect(generateMessage('db:cleaned', { kept: 2, dropped: ['a', 'b', 'c'] })).toBe('Cleanup kept 2 branches, dropped 3')
        expect(generateMessage('hook:uninstalled', { hooksDir: '/repo/.git/hooks', hooks: [] }))
            .toBe('Removed no hooks from /repo/.git/hooks')
        expect(generateMessage('branch:skipped', { branch: 'feature/x', reason: 'not-creatable' }))
            .toBe('Git branch feature/x configured not to create PostgreSQL branch')
        expect(generateMessage('error', { source: 'state', error: new Error('disk full') })).toBe('Error in state: disk full')
    })

    it('should fall back to a generic format', () => {

        expect(generateMessage('custom:thing', { a: 1, s: 'x' })).toBe('custom thing: a=1, s="x"')
        expect(generateMessage('custom:thing', { list: [1, 2], obj: { k: 1 } })).toBe('custom thing: list=[2 items], obj={1 keys}')
        expect(generateMessage('custom:thing', {})).toBe('custom thing')
        expect(generateMessage('custom:long', { s: 'y'.repeat(60) })).toBe(`custom long: s="${'y'.repeat(47)}..."`)
    })

    it('should build entries and include data on request', () => {

        const entry = formatEntry('switch:warning', { branch: 'b', message: 'm', err: new Error('e') }, true)

        expect(entry.level).toBe('warn')
        expect(entry.event).toBe('switch:warning')
        expect(entry.message).toBe('b: m')
        expect(entry.data).toEqual({ branch: 'b', message: 'm', err: { name: 'Error', message: 'e' } })
        expect(formatEntry('switch:warning', { branch: 'b', message: 'm' }).data).toBeUndefined()
    })

    it('should serialize one JSON line', () => {

        const line = serializeEntry({ timestamp: 't', level: 'info', event: 'e', message: 'm' })

        expect(line).toBe('{"timestamp":"t","level":"info","event":"e","message":"m"}\n')
    })
})
