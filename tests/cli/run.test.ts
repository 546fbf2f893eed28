/**
 * End-to-end command tests.
 *
 * Commands run through runCommand against a temp project directory, an
 * in-memory database server, a recording post command runner and a git
 * binary answered from a lookup table.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { Writable } from 'node:stream'

const { execFileSync } = vi.hoisted(() => ({
    execFileSync: vi.fn<(file: string, args: readonly string[]) => string>(),
}))

vi.mock('child_process', () => ({ execFileSync, spawn: vi.fn() }))

import { NO_CONFIG_MESSAGE } from '../../src/cli/handlers.js'
import { runCommand } from '../../src/cli/run.js'
import type { CliEnvironment, CliFlags, CommandName } from '../../src/cli/types.js'
import { loadConfigFile } from '../../src/core/config/loader.js'
import { DatabaseManager } from '../../src/core/db/manager.js'
import { GitRepository } from '../../src/core/git/repository.js'
import type { CommandRunner } from '../../src/core/post-commands/types.js'
import { LocalStateStore } from '../../src/core/state/manager.js'
import { FakeDatabaseServer } from '../support/fake-database.js'


const ANSI = /\x1b\[[0-9;]*m/g

const NO_FLAGS: CliFlags = { force: false, fromCompose: false, template: false }


function collector() {

    const chunks: string[] = []

    const stream = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {

            chunks.push(String(chunk))
            callback()
        },
    })

    return { stream, text: () => chunks.join('').replace(ANSI, '') }
}


describe('cli: runCommand', () => {

    let project: string
    let configPath: string
    let server: FakeDatabaseServer
    let state: LocalStateStore
    let answer: string | null
    let env: NodeJS.ProcessEnv
    let commands: string[]

    const runner: CommandRunner = async (command) => {

        commands.push(command)

        return { exitCode: 0, signal: null }
    }

    /**
     * Answer git from a table; everything else fails like outside a repository.
     */
    function gitOnBranch(branch: string | null): void {

        const table: Record<string, string> = {
            'rev-parse --show-toplevel': project,
            'rev-parse --absolute-git-dir': join(project, '.git'),
            'rev-parse --git-path hooks': join(project, '.git', 'hooks'),
            'symbolic-ref --short -q refs/remotes/origin/HEAD': 'origin/trunk',
        }

        if (branch !== null) table['symbolic-ref --short -q HEAD'] = branch

        execFileSync.mockImplementation((_file, args) => {

            const output = table[args.join(' ')]

            if (output === undefined) throw new Error('fatal: not a git repository')

            return output
        })
    }

    async function run(command: CommandName, args: string[] = [], flags: Partial<CliFlags> = {}) {

        const stdout = collector()
        const stderr = collector()

        const environment: CliEnvironment = {
            cwd: project,
            env,
            stdout: stdout.stream,
            stderr: stderr.stream,
            openGit: (cwd) => GitRepository.open(cwd),
            connect: async (config) => new DatabaseManager(config, server),
            state,
            ask: async () => answer,
            promptPassword: async () => null,
            runner,
        }

        const code = await runCommand({ command, args, flags: { ...NO_FLAGS, ...flags } }, environment)

        return { code, out: stdout.text(), err: stderr.text() }
    }

    function writeConfig(content = 'git:\n  main_branch: main\n'): void {

        writeFileSync(configPath, content)
    }

    beforeEach(() => {

        project = mkdtempSync(join(process.cwd(), 'tmp', 'pgbranch-test-'))
        configPath = join(project, '.pgbranch.yml')
        server = new FakeDatabaseServer()
        state = new LocalStateStore({ stateDir: join(project, '.state') })
        answer = null
        env = {}
        commands = []
        execFileSync.mockReset()
        execFileSync.mockImplementation(() => {

            throw new Error('fatal: not a git repository')
        })
    })

    afterEach(() => {

        rmSync(project, { recursive: true, force: true })
    })

    describe('help', () => {

        it('should print the usage', async () => {

            const { code, out } = await run('help')

            expect(code).toBe(0)
            expect(out.startsWith('Usage\n    $ pgbranch <command> [options]\n')).toBe(true)
        })

        it('should describe one command', async () => {

            const { code, out } = await run('help', ['switch'])

            expect(code).toBe(0)
            expect(out).toBe('pgbranch switch [<branch>] [--template]\n\n  Switch to a branch database, creating it when missing\n')
        })

        it('should reject an unknown topic', async () => {

            const { code, out } = await run('help', ['nope'])

            expect(code).toBe(1)
            expect(out).toBe("✗ Unknown command 'nope'\n")
        })
    })

    describe('configuration', () => {

        it('should refuse commands that need a config file', async () => {

            const { code, out, err } = await run('list')

            expect(code).toBe(1)
            expect(out).toBe('')
            expect(err).toBe(`✗ ${NO_CONFIG_MESSAGE}\n`)
        })

        it('should turn a malformed config into exit code 1', async () => {

            writeConfig('database:\n  port: nope\n')

            const { code, err } = await run('list')

            expect(code).toBe(1)
            expect(err.startsWith(`✗ Invalid configuration in ${configPath}: database.port: `)).toBe(true)
        })

        it('should turn a malformed boolean variable into exit code 1', async () => {

            writeConfig()
            env = { PGBRANCH_DISABLED: 'maybe' }

            const { code, err } = await run('config')

            expect(code).toBe(1)
            expect(err).toBe(
                '✗ Invalid boolean value for PGBRANCH_DISABLED: "maybe" (expected true/false, 1/0, yes/no or on/off)\n',
            )
        })

        it('should print the effective config with the password masked', async () => {

            writeConfig('database:\n  password: test-secret\n')
            env = { PGBRANCH_DATABASE_HOST: 'env-host' }

            const { code, out } = await run('config')

            expect(code).toBe(0)
            expect(out.split('\n')[0]).toBe(`# ${configPath}`)
            expect(out).toContain('  host: env-host\n')
            expect(out).toContain('***')
            expect(out).not.toContain('test-secret')
        })

        it('should show defaults without a config file', async () => {

            const { code, out } = await run('config')

            expect(code).toBe(0)
            expect(out.split('\n')[0]).toBe('# built-in defaults (no .pgbranch.yml found)')
        })
    })

    describe('init', () => {

        it('should write the default config', async () => {

            const { code, out } = await run('init')

            expect(code).toBe(0)
            expect(out).toBe([
                '⚠ Could not detect the main Git branch, using default: main',
                `✓ Initialized pgbranch configuration at: ${configPath}`,
                '',
            ].join('\n'))
            expect(loadConfigFile(configPath).database.database_prefix).toBe('pgbranch')
        })

        it('should use the detected main branch', async () => {

            gitOnBranch('feature/x')

            const { out } = await run('init')

            expect(out.split('\n')[0]).toBe('• Detected main Git branch: trunk')
            expect(loadConfigFile(configPath).git.main_branch).toBe('trunk')
        })

        it('should not overwrite without --force', async () => {

            writeConfig('database:\n  host: keep-me\n')

            const refused = await run('init')

            expect(refused.code).toBe(1)
            expect(refused.out).toBe('✗ Configuration file already exists. Use --force to overwrite.\n')
            expect(loadConfigFile(configPath).database.host).toBe('keep-me')

            const forced = await run('init', [], { force: true })

            expect(forced.code).toBe(0)
            expect(loadConfigFile(configPath).database.host).toBe('localhost')
        })

        it('should take database settings from docker compose', async () => {

            writeFileSync(join(project, 'docker-compose.yml'), [
                'services:',
                '  db:',
                '    image: postgres:16',
                '    ports:',
                '      - "5433:5432"',
                '    environment:',
                '      POSTGRES_USER: app',
                '      POSTGRES_PASSWORD: test-secret',
                '      POSTGRES_DB: app_template',
                '',
            ].join('\n'))

            const { code, out } = await run('init', [], { fromCompose: true })
            const { database } = loadConfigFile(configPath)

            expect(code).toBe(0)
            expect(out).toContain(`✓ Using PostgreSQL settings of service "db" from ${join(project, 'docker-compose.yml')}\n`)
            expect(database).toMatchObject({
                host: 'localhost',
                port: 5433,
                user: 'app',
                password: 'test-secret',
                template_database: 'app_template',
            })
        })

        it('should say when there is no compose file', async () => {

            const { out } = await run('init', [], { fromCompose: true })

            expect(out).toContain('• No Docker Compose files found\n')
        })
    })

    describe('create and delete', () => {

        beforeEach(() => writeConfig())

        it('should create a branch database once', async () => {

            const first = await run('create', ['feature/login'])

            expect(first.code).toBe(0)
            expect(first.out).toBe('✓ Created database branch: feature/login (pgbranch_feature_login)\n')

            const second = await run('create', ['feature/login'])

            expect(second.out).toBe('• Database pgbranch_feature_login already exists\n')
            expect(server.closed).toBe(2)
        })

        it('should run post commands after creating', async () => {

            writeConfig('post_commands:\n  - echo {db_name}\n')

            const { out } = await run('create', ['feature/login'])

            expect(commands).toEqual(['echo pgbranch_feature_login'])
            expect(out).toBe([
                '✓ Created database branch: feature/login (pgbranch_feature_login)',
                '✓ echo {db_name}',
                '',
            ].join('\n'))
        })

        it('should require a branch name', async () => {

            const { code, out } = await run('create')

            expect(code).toBe(1)
            expect(out).toBe('✗ Missing branch name. Usage: pgbranch create <branch>\n')
        })

        it('should drop a branch database', async () => {

            server.add('pgbranch_feature_login')

            const dropped = await run('delete', ['feature/login'])

            expect(dropped.out).toBe('✓ Deleted database branch: feature/login (pgbranch_feature_login)\n')

            const missing = await run('delete', ['feature/login'])

            expect(missing.out).toBe('• Database pgbranch_feature_login does not exist\n')
        })

        it('should refuse to drop the template', async () => {

            const { code, err } = await run('delete', ['main'])

            expect(code).toBe(1)
            expect(err).toContain('✗ Refusing to drop the template database template0\n')
            expect(server.databases.has('template0')).toBe(true)
        })
    })

    describe('list', () => {

        beforeEach(() => writeConfig())

        it('should mark the template when on main', async () => {

            server.add('pgbranch_alpha').add('pgbranch_beta')

            const { code, out } = await run('list')

            expect(code).toBe(0)
            expect(out).toBe([
                'PostgreSQL branches:',
                '* template0 (main)',
                '  beta',
                '  alpha',
                '',
            ].join('\n'))
        })

        it('should mark the branch in use', async () => {

            server.add('pgbranch_alpha').add('pgbranch_beta')
            state.setCurrentBranch(configPath, 'alpha')

            const { out } = await run('list')

            expect(out).toBe([
                'PostgreSQL branches:',
                '  template0 (main)',
                '  beta',
                '* alpha',
                '',
            ].join('\n'))
        })

        it('should still show main and the current branch without a server', async () => {

            server.reachable = false
            state.setCurrentBranch(configPath, 'alpha')

            const { code, out } = await run('list')

            expect(code).toBe(0)
            expect(out).toBe([
                '⚠ Could not list database branches: Failed to list databases: connect ECONNREFUSED 127.0.0.1:5432',
                'PostgreSQL branches:',
                '  template0 (main)',
                '* alpha',
                '',
            ].join('\n'))
        })
    })

    describe('switch', () => {

        beforeEach(() => writeConfig())

        it('should switch and create the branch database', async () => {

            const { code, out } = await run('switch', ['feature/login'])

            expect(code).toBe(0)
            expect(out).toBe('✓ Switched to PostgreSQL branch: feature_login\n')
            expect(state.getCurrentBranch(configPath)).toBe('feature_login')
            expect(server.databases.has('pgbranch_feature_login')).toBe(true)
        })

        it('should switch to the template for main, _main and --template', async () => {

            for (const [args, flags] of [[['main'], {}], [['_main'], {}], [[], { template: true }]] as const) {

                state.setCurrentBranch(configPath, 'other')

                const { out } = await run('switch', [...args], flags)

                expect(out).toBe('✓ Switched to main database: template0\n')
                expect(state.getCurrentBranch(configPath)).toBe('_main')
            }

            expect(server.created).toEqual([])
        })

        it('should record the branch and warn when the server is down', async () => {

            server.reachable = false

            const { code, out } = await run('switch', ['feature/login'])

            expect(code).toBe(0)
            expect(out).toBe([
                '⚠ Failed to create the branch database, branch state was still updated: '
                    + 'Failed to check database pgbranch_feature_login: connect ECONNREFUSED 127.0.0.1:5432',
                '✓ Switched to PostgreSQL branch: feature_login',
                '',
            ].join('\n'))
            expect(state.getCurrentBranch(configPath)).toBe('feature_login')
        })

        it('should ask for a branch after listing', async () => {

            answer = 'feature/picked'

            const { code, out } = await run('switch')

            expect(code).toBe(0)
            expect(out).toBe([
                'PostgreSQL branches:',
                '* template0 (main)',
                '✓ Switched to PostgreSQL branch: feature_picked',
                '',
            ].join('\n'))
        })

        it('should fail when no branch is given', async () => {

            const { code, out } = await run('switch')

            expect(code).toBe(1)
            expect(out.endsWith('✗ No branch given. Usage: pgbranch switch <branch>\n')).toBe(true)
            expect(state.getCurrentBranch(configPath)).toBeNull()
        })
    })

    describe('cleanup', () => {

        beforeEach(() => writeConfig())

        it('should keep the newest branch databases', async () => {

            server.add('pgbranch_a').add('pgbranch_b').add('pgbranch_c')

            const { code, out } = await run('cleanup', [], { maxCount: 1 })

            expect(code).toBe(0)
            expect(out).toBe([
                '• Dropped pgbranch_b',
                '• Dropped pgbranch_a',
                '✓ Cleaned up old database branches, keeping the 1 most recent',
                '',
            ].join('\n'))
        })

        it('should default to behavior.max_branches', async () => {

            writeConfig('behavior:\n  max_branches: 2\n')
            server.add('pgbranch_a').add('pgbranch_b').add('pgbranch_c')

            const { out } = await run('cleanup')

            expect(out).toBe([
                '• Dropped pgbranch_a',
                '✓ Cleaned up old database branches, keeping the 2 most recent',
                '',
            ].join('\n'))
        })
    })

    describe('check', () => {

        it('should pass with a valid setup', async () => {

            writeConfig()
            gitOnBranch('main')

            const { code, out } = await run('check')

            expect(code).toBe(0)
            expect(out).toBe([
                `✓ Configuration file found and valid: ${configPath}`,
                '✓ PostgreSQL connection connected',
                "✓ Template database 'template0' found",
                '✓ Database permissions can create databases',
                `✓ Git repository ${project}`,
                "! Git hooks not installed (run 'pgbranch install-hooks')",
                '',
                '✓ All checks passed! pgbranch is ready to use.',
                '',
            ].join('\n'))
        })

        it('should fail outside a repository and with a bad filter', async () => {

            writeConfig('git:\n  branch_filter_regex: "(["\n')

            const { code, out } = await run('check')
            const lines = out.split('\n')

            expect(code).toBe(1)
            expect(lines[0]?.startsWith('✗ Configuration file git.branch_filter_regex: invalid regular expression: ')).toBe(true)
            expect(lines).toContain('✗ Git repository not a Git repository')
            expect(lines.at(-2)).toBe('✗ Some checks failed. Please address the issues above.')
        })

        it('should report a server it cannot reach', async () => {

            writeConfig()
            gitOnBranch('main')
            server.reachable = false

            const { code, out } = await run('check')

            expect(code).toBe(1)
            expect(out).toContain('✗ PostgreSQL connection server did not answer\n')
            expect(out).toContain("✗ Template database 'template0' error: Failed to check database template0: connect ECONNREFUSED 127.0.0.1:5432\n")
        })
    })

    describe('hooks', () => {

        it('should install and remove hooks', async () => {

            gitOnBranch('main')

            const installed = await run('install-hooks')

            expect(installed.code).toBe(0)
            expect(installed.out).toBe('✓ Installed Git hooks: post-checkout, post-merge\n')
            expect(existsSync(join(project, '.git', 'hooks', 'post-checkout'))).toBe(true)

            const removed = await run('uninstall-hooks')

            expect(removed.out).toBe('✓ Uninstalled Git hooks: post-checkout, post-merge\n')

            const again = await run('uninstall-hooks')

            expect(again.out).toBe('• No pgbranch hooks installed\n')
        })

        it('should need a repository', async () => {

            const { code, out } = await run('install-hooks')

            expect(code).toBe(1)
            expect(out).toBe('✗ Not a Git repository\n')
        })

        it('should keep a foreign hook unless forced', async () => {

            gitOnBranch('main')
            await run('install-hooks')
            writeFileSync(join(project, '.git', 'hooks', 'post-merge'), '#!/bin/sh\necho mine\n')

            const { out } = await run('install-hooks')

            expect(out).toBe([
                '⚠ Skipped post-merge: an existing hook was not written by pgbranch (use --force to replace it)',
                '✓ Installed Git hooks: post-checkout',
                '',
            ].join('\n'))
            expect(readFileSync(join(project, '.git', 'hooks', 'post-merge'), 'utf8')).toBe('#!/bin/sh\necho mine\n')
        })
    })

    describe('git-hook', () => {

        beforeEach(() => writeConfig())

        it('should switch to the checked-out branch', async () => {

            gitOnBranch('feature/login')

            const { code, out } = await run('git-hook')

            expect(code).toBe(0)
            expect(out).toBe('✓ Switched to PostgreSQL branch: feature_login\n')
            expect(state.getCurrentBranch(configPath)).toBe('feature_login')
        })

        it('should do nothing when hooks are skipped', async () => {

            gitOnBranch('feature/login')
            env = { PGBRANCH_SKIP_HOOKS: 'true' }

            const { code, out } = await run('git-hook')

            expect(code).toBe(0)
            expect(out).toBe('')
            expect(state.getCurrentBranch(configPath)).toBeNull()
        })

        it('should do nothing for a disabled branch', async () => {

            gitOnBranch('wip/spike')
            writeFileSync(join(project, '.pgbranch.local.yml'), 'disabled_branches:\n  - wip/*\n')

            const { out } = await run('git-hook')

            expect(out).toBe('')
            expect(server.created).toEqual([])
        })
    })

    describe('post command helpers', () => {

        beforeEach(() => writeConfig('post_commands:\n  - echo {db_name}\n'))

        it('should list template variables', async () => {

            const { code, out } = await run('templates', ['feature/login'])
            const lines = out.split('\n')

            expect(code).toBe(0)
            expect(lines[0]).toBe('Template variables for branch: feature/login')
            expect(lines[2]).toBe(`  {db_name}     ${'pgbranch_feature_login'.padEnd(24)} Database name for the branch`)
            expect(lines[6]).toBe(`  {db_password} ${'(not set)'.padEnd(24)} Database password (if configured)`)
        })

        it('should use an example branch by default', async () => {

            const { out } = await run('templates')

            expect(out.split('\n')[0]).toBe('Template variables for branch: feature/example-branch')
        })

        it('should run post commands without touching state or the server', async () => {

            const { code, out } = await run('test-post-commands', ['feature/login'])

            expect(code).toBe(0)
            expect(out).toBe([
                '◇ Testing post-commands for branch: feature/login',
                '✓ echo {db_name}',
                '',
            ].join('\n'))
            expect(commands).toEqual(['echo pgbranch_feature_login'])
            expect(state.getCurrentBranch(configPath)).toBeNull()
            expect(server.created).toEqual([])
        })

        it('should say when there are no post commands', async () => {

            writeConfig()

            const { out } = await run('test-post-commands', ['feature/login'])

            expect(out).toBe([
                '◇ Testing post-commands for branch: feature/login',
                '• No post-commands configured',
                '',
            ].join('\n'))
        })

        it('should preview a switch', async () => {

            const { code, out } = await run('test-switch', ['Feature/X'])

            expect(code).toBe(0)
            expect(out).toBe([
                '◇ Testing switch to PostgreSQL branch: feature_x',
                '• Database: pgbranch_feature_x',
                '✓ echo {db_name}',
                '',
            ].join('\n'))
            expect(commands).toEqual(['echo pgbranch_feature_x'])
            expect(state.getCurrentBranch(configPath)).toBeNull()
            expect(server.created).toEqual([])
        })
    })
})
