/**
 * Branch classification.
 */
import { describe, it, expect, afterEach } from 'vitest';

import {
    classifyBranch,
    isMainBranch,
    shouldCreateBranch,
    shouldSwitchOnBranch,
} from '../../../src/core/branch/classifier.js';
import { createDefaultConfig } from '../../../src/core/config/defaults.js';
import { observer } from '../../../src/core/observer.js';

describe('branch: classifier', () => {

    let cleanup: (() => void) | null = null;

    afterEach(() => {

        cleanup?.();
        cleanup = null;

    });

    it('should classify with the defaults', () => {

        const config = createDefaultConfig();

        expect(classifyBranch('main', config)).toBe('main');
        expect(classifyBranch('master', config)).toBe('ignore');
        expect(classifyBranch('feature/login', config)).toBe('create');

    });

    it('should switch without creating when auto create is off', () => {

        const config = createDefaultConfig();

        config.git.auto_create_on_branch = false;

        expect(classifyBranch('feature/login', config)).toBe('switch');
        expect(shouldCreateBranch('feature/login', config)).toBe(false);

    });

    it('should ignore everything when auto switch is off', () => {

        const config = createDefaultConfig();

        config.git.auto_switch_on_branch = false;

        expect(classifyBranch('main', config)).toBe('ignore');
        expect(classifyBranch('feature/login', config)).toBe('ignore');

    });

    it('should apply the branch filter', () => {

        const config = createDefaultConfig();

        config.git.branch_filter_regex = '^feature/';

        expect(classifyBranch('feature/login', config)).toBe('create');
        expect(classifyBranch('bugfix/crash', config)).toBe('ignore');
        expect(classifyBranch('main', config)).toBe('main');

    });

    it('should let the main branch pass exclusions for switching', () => {

        const config = createDefaultConfig();

        config.git.main_branch = 'master';

        expect(shouldSwitchOnBranch('master', config)).toBe(true);
        expect(shouldCreateBranch('master', config)).toBe(false);
        expect(classifyBranch('master', config)).toBe('main');

    });

    it('should not filter on auto_create_branch_filter', () => {

        const config = createDefaultConfig();

        config.git.auto_create_branch_filter = '^feature/';

        expect(shouldCreateBranch('bugfix/x', config)).toBe(true);
        expect(shouldSwitchOnBranch('bugfix/x', config)).toBe(true);
        expect(classifyBranch('bugfix/x', config)).toBe('create');

        config.git.branch_filter_regex = '^feature/';

        expect(classifyBranch('bugfix/x', config)).toBe('ignore');

    });

    it('should answer false for an invalid filter and report it', () => {

        const filters: string[] = [];

        cleanup = observer.on('branch:filter-invalid', ({ filter }) => {

            filters.push(filter);

        });

        const config = createDefaultConfig();

        config.git.branch_filter_regex = '([';

        expect(shouldCreateBranch('feature/x', config)).toBe(false);
        expect(shouldSwitchOnBranch('feature/x', config)).toBe(false);
        expect(classifyBranch('main', config)).toBe('main');
        expect(filters).toEqual(['([', '([']);

    });

    it('should recognise the main branch and the sentinel', () => {

        const config = createDefaultConfig();

        expect(isMainBranch('_main', config)).toBe(true);
        expect(isMainBranch('main', config)).toBe(true);
        expect(isMainBranch('develop', config)).toBe(false);

    });

});
