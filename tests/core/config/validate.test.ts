/**
 * Resolved config checks.
 */
import { describe, it, expect } from 'vitest'

import { createDefaultConfig } from '../../../src/core/config/defaults.js'
import { validateResolvedConfig } from '../../../src/core/config/validate.js'


describe('config: validateResolvedConfig', () => {

    it('should accept the defaults', () => {

        expect(validateResolvedConfig(createDefaultConfig())).toEqual([])
    })

    it('should report empty required fields', () => {

        const config = createDefaultConfig()

        config.database.host = ''
        config.database.template_database = '  '
        config.git.main_branch = ''

        expect(validateResolvedConfig(config)).toEqual([
            { field: 'database.host', message: 'must not be empty' },
            { field: 'database.template_database', message: 'must not be empty' },
            { field: 'git.main_branch', message: 'must not be empty' },
        ])
    })

    it('should report port 0', () => {

        const config = createDefaultConfig()

        config.database.port = 0

        expect(validateResolvedConfig(config)).toEqual([
            { field: 'database.port', message: 'must not be 0' },
        ])
    })

    it('should check the prefix is an identifier start', () => {

        const config = createDefaultConfig()

        config.database.database_prefix = 'My-App'

        expect(validateResolvedConfig(config)).toEqual([
            {
                field: 'database.database_prefix',
                message: 'must start with a lowercase letter or underscore and contain only a-z, 0-9, _ or $',
            },
        ])

        config.database.database_prefix = '_app$1'

        expect(validateResolvedConfig(config)).toEqual([])
    })

    it('should only report an empty prefix once', () => {

        const config = createDefaultConfig()

        config.database.database_prefix = ''

        expect(validateResolvedConfig(config)).toEqual([
            { field: 'database.database_prefix', message: 'must not be empty' },
        ])
    })

    it('should report filters that do not compile', () => {

        const config = createDefaultConfig()

        config.git.branch_filter_regex = '(['
        config.git.auto_create_branch_filter = '^feature/'

        const problems = validateResolvedConfig(config)

        expect(problems).toHaveLength(1)
        expect(problems[0]?.field).toBe('git.branch_filter_regex')
        expect(problems[0]?.message.startsWith('invalid regular expression: ')).toBe(true)
    })
})
