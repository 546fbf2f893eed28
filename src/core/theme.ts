/**
 * Terminal theme.
 *
 * Colours and status prefixes for CLI output. ansis drops the colours by
 * itself when stdout is not a TTY or NO_COLOR is set.
 *
 * @example
 * ```typescript
 * import { status, ui } from '../core/theme.js'
 *
 * console.log(status.success('Switched to feature_login'))
 * console.log(ui.current('feature_login'))
 * ```
 */
import ansis from 'ansis';

// ─────────────────────────────────────────────────────────────
// Palette
// ─────────────────────────────────────────────────────────────

export const palette = {
    accent: '#38BDF8',
    success: '#22C55E',
    warning: '#EAB308',
    error: '#F43F5E',
    info: '#A78BFA',
    muted: '#94A3B8',
} as const;

export const theme = {
    accent: (text: string) => ansis.hex(palette.accent)(text),
    success: (text: string) => ansis.hex(palette.success)(text),
    warning: (text: string) => ansis.hex(palette.warning)(text),
    error: (text: string) => ansis.hex(palette.error)(text),
    info: (text: string) => ansis.hex(palette.info)(text),
    muted: (text: string) => ansis.hex(palette.muted)(text),
    bold: ansis.bold,
};

export const icons = {
    success: '✓',
    error: '✗',
    warning: '⚠',
    info: '•',
    test: '◇',
} as const;

// ─────────────────────────────────────────────────────────────
// Status lines
// ─────────────────────────────────────────────────────────────

export const status = {

    success(message: string): string {

        return `${theme.success(icons.success)} ${message}`;

    },

    error(message: string): string {

        return `${theme.error(icons.error)} ${theme.error(message)}`;

    },

    warning(message: string): string {

        return `${theme.warning(icons.warning)} ${message}`;

    },

    info(message: string): string {

        return `${theme.info(icons.info)} ${message}`;

    },

    /** Dry-run lines of `test-switch` and `test-post-commands` */
    test(message: string): string {

        return `${theme.accent(icons.test)} ${message}`;

    },

} as const;

// ─────────────────────────────────────────────────────────────
// Listing helpers
// ─────────────────────────────────────────────────────────────

export const ui = {

    heading: (text: string) => theme.bold(text),

    /** Row of the branch in use, marked with `* ` */
    current: (text: string) => `${theme.success('*')} ${theme.bold(text)}`,

    /** Any other row, aligned with the current one */
    entry: (text: string) => `  ${text}`,

    label: (text: string) => theme.muted(text),

    /** Pass/fail cell of `check` */
    check: (ok: boolean) => (ok ? theme.success(icons.success) : theme.error(icons.error)),

} as const;
