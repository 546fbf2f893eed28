/**
 * Git accessor.
 *
 * Thin wrapper over the git binary. Every query degrades to null or
 * false when git is missing or the directory is not a repository.
 */
import { execFileSync } from 'child_process';
import { isAbsolute, join, resolve } from 'path';

import { attemptSync } from '@logosdx/utils';

import type { GitBranchProvider } from '../config/types.js';
import { observer } from '../observer.js';

/**
 * Branch names tried, in order, when origin/HEAD is not set.
 */
const MAIN_BRANCH_CANDIDATES = ['main', 'master', 'develop'];

/**
 * Run git and return trimmed stdout.
 *
 * @throws when git exits non-zero or is not installed
 */
function git(cwd: string, args: string[]): string {

    return execFileSync('git', args, {
        cwd,
        encoding: 'utf8',
        timeout: 5000,
        stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();

}

/**
 * A git working tree.
 *
 * @example
 * ```typescript
 * const repo = GitRepository.open(process.cwd())
 *
 * if (repo) {
 *     console.log(repo.getCurrentBranch())  // 'feature/login' or null
 * }
 * ```
 */
export class GitRepository implements GitBranchProvider {

    readonly root: string;
    readonly gitDir: string;

    private constructor(root: string, gitDir: string) {

        this.root = root;
        this.gitDir = gitDir;

    }

    /**
     * Open the repository containing `cwd`. Null outside a repository.
     */
    static open(cwd: string): GitRepository | null {

        const dir = resolve(cwd);

        const [root, rootErr] = attemptSync(() => git(dir, ['rev-parse', '--show-toplevel']));

        if (rootErr) {

            observer.emit('git:unavailable', { cwd: dir, error: rootErr.message });

            return null;

        }

        const [gitDir, gitDirErr] = attemptSync(() => git(dir, ['rev-parse', '--absolute-git-dir']));

        if (gitDirErr) {

            observer.emit('git:unavailable', { cwd: dir, error: gitDirErr.message });

            return null;

        }

        return new GitRepository(root, gitDir);

    }

    /**
     * Short name of the checked-out branch.
     *
     * Null on a detached or unborn HEAD.
     */
    getCurrentBranch(): string | null {

        const [branch] = attemptSync(() => git(this.root, ['symbolic-ref', '--short', '-q', 'HEAD']));

        return branch || null;

    }

    /**
     * Whether a local branch exists.
     */
    branchExists(name: string): boolean {

        const [, err] = attemptSync(() =>
            git(this.root, ['show-ref', '--verify', '--quiet', `refs/heads/${name}`]),
        );

        return !err;

    }

    /**
     * All local branch names.
     */
    listBranches(): string[] {

        const [output] = attemptSync(() =>
            git(this.root, ['for-each-ref', '--format=%(refname:short)', 'refs/heads']),
        );

        if (!output) return [];

        return output
            .split('\n')
            .map((line) => line.trim())
            .filter((line) => line.length > 0);

    }

    /**
     * Guess the repository's main branch.
     *
     * Uses the target of origin/HEAD, else the first existing of
     * `main`, `master` and `develop`.
     */
    detectMainBranch(): string | null {

        const [remoteHead] = attemptSync(() =>
            git(this.root, ['symbolic-ref', '--short', '-q', 'refs/remotes/origin/HEAD']),
        );

        if (remoteHead) {

            return remoteHead.replace(/^origin\//, '');

        }

        return MAIN_BRANCH_CANDIDATES.find((name) => this.branchExists(name)) ?? null;

    }

    /**
     * Directory git runs hooks from. Honours `core.hooksPath`.
     */
    getHooksDir(): string {

        const [hooksPath] = attemptSync(() => git(this.root, ['rev-parse', '--git-path', 'hooks']));

        if (!hooksPath) {

            return join(this.gitDir, 'hooks');

        }

        return isAbsolute(hooksPath) ? hooksPath : resolve(this.root, hooksPath);

    }

}
