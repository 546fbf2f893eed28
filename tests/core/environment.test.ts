/**
 * Runtime environment detection.
 */
import { describe, it, expect } from 'vitest';

import { getLogLevel, isCi, isDebug } from '../../src/core/environment.js';

describe('environment', () => {

    it('should detect CI from any known variable', () => {

        expect(isCi({})).toBe(false);
        expect(isCi({ CI: 'true' })).toBe(true);
        expect(isCi({ GITHUB_ACTIONS: 'true' })).toBe(true);
        expect(isCi({ CI: '' })).toBe(false);

    });

    it('should detect debug mode', () => {

        expect(isDebug({ PGBRANCH_DEBUG: 'true' })).toBe(true);
        expect(isDebug({ PGBRANCH_DEBUG: '1' })).toBe(false);

    });

    it('should read the log level', () => {

        expect(getLogLevel({})).toBe('warn');
        expect(getLogLevel({ PGBRANCH_LOG_LEVEL: ' INFO ' })).toBe('info');
        expect(getLogLevel({ PGBRANCH_LOG_LEVEL: 'silent' })).toBe('silent');
        expect(getLogLevel({ PGBRANCH_LOG_LEVEL: 'chatty' })).toBe('warn');
        expect(getLogLevel({ PGBRANCH_LOG_LEVEL: 'error', PGBRANCH_DEBUG: 'true' })).toBe('verbose');

    });

});
