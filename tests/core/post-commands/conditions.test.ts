/**
 * Post command conditions.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';

import { evaluateCondition } from '../../../src/core/post-commands/conditions.js';

describe('post-commands: evaluateCondition', () => {

    let baseDir: string;

    beforeEach(() => {

        baseDir = mkdtempSync(join(process.cwd(), 'tmp', 'pgbranch-test-'));
        writeFileSync(join(baseDir, 'manage.py'), '');
        mkdirSync(join(baseDir, 'migrations'));

    });

    afterEach(() => {

        rmSync(baseDir, { recursive: true, force: true });

    });

    it('should check files relative to the base directory', () => {

        const context = { baseDir, env: {} };

        expect(evaluateCondition('file_exists:manage.py', context)).toBe(true);
        expect(evaluateCondition('file_exists: manage.py ', context)).toBe(true);
        expect(evaluateCondition('file_exists:missing.py', context)).toBe(false);
        expect(evaluateCondition('file_exists:migrations', context)).toBe(false);

    });

    it('should check directories', () => {

        const context = { baseDir, env: {} };

        expect(evaluateCondition('dir_exists:migrations', context)).toBe(true);
        expect(evaluateCondition('dir_exists:manage.py', context)).toBe(false);
        expect(evaluateCondition('dir_exists:nope', context)).toBe(false);

    });

    it('should check environment variables are set and non-empty', () => {

        const context = { baseDir, env: { CI: 'true', EMPTY: '' } };

        expect(evaluateCondition('env_set:CI', context)).toBe(true);
        expect(evaluateCondition('env_set:EMPTY', context)).toBe(false);
        expect(evaluateCondition('env_set:MISSING', context)).toBe(false);

    });

    it('should answer null for unknown conditions', () => {

        const context = { baseDir, env: {} };

        expect(evaluateCondition('branch_is:main', context)).toBeNull();
        expect(evaluateCondition('always', context)).toBeNull();

    });

});
