/**
 * Event classification tests.
 */
import { describe, it, expect } from 'vitest';

import { classifyEvent, shouldLog, shouldLogLevel } from '../../../src/core/logger/classifier.js';

describe('logger: classifier', () => {

    it('should classify by event name', () => {

        expect(classifyEvent('error')).toBe('error');
        expect(classifyEvent('db:error')).toBe('error');
        expect(classifyEvent('post-command:failed')).toBe('error');
        expect(classifyEvent('switch:warning')).toBe('warn');
        expect(classifyEvent('branch:filter-invalid')).toBe('warn');
        expect(classifyEvent('compose:invalid')).toBe('warn');
        expect(classifyEvent('config:deprecated')).toBe('warn');
        expect(classifyEvent('switch:start')).toBe('info');
        expect(classifyEvent('db:created')).toBe('info');
        expect(classifyEvent('db:auth')).toBe('debug');
        expect(classifyEvent('compose:detected')).toBe('debug');

    });

    it('should filter by configured level', () => {

        expect(shouldLog('switch:warning', 'warn')).toBe(true);
        expect(shouldLog('switch:start', 'warn')).toBe(false);
        expect(shouldLog('switch:start', 'info')).toBe(true);
        expect(shouldLog('db:auth', 'info')).toBe(false);
        expect(shouldLog('db:auth', 'verbose')).toBe(true);
        expect(shouldLog('error', 'silent')).toBe(false);
        expect(shouldLog('error', 'error')).toBe(true);

        expect(shouldLogLevel('debug', 'info')).toBe(false);
        expect(shouldLogLevel('warn', 'error')).toBe(false);

    });

});
