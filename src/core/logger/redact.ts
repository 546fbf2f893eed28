/**
 * Redaction
 *
 * Masks sensitive fields in log data before it is written.
 * Field names are matched in all common case variations
 * (camelCase, snake_case, kebab-case, SCREAMING_CASE).
 *
 * @example
 * ```typescript
 * maskValue('hunter22', 'db_password', 'info')
 * // => '<DbPassword ******** (8) />'
 *
 * maskValue('hunter22', 'db_password', 'verbose')
 * // => '<DbPassword hunt**** (8) />'
 * ```
 */
import type { LogLevel } from './types.js';

const MASK_MAX_LENGTH = 12;

const MASKED_FIELDS = new Set<string>();

// ─────────────────────────────────────────────────────────────
// Case Conversion Helpers
// ─────────────────────────────────────────────────────────────

function toCamelCase(str: string): string {

    return str
        .replace(/[-_\s]+(.)?/g, (_, c: string | undefined) => (c ? c.toUpperCase() : ''))
        .replace(/^[A-Z]/, (c) => c.toLowerCase());

}

function toSnakeCase(str: string): string {

    return str
        .replace(/[-\s]+/g, '_')
        .replace(/([a-z])([A-Z])/g, '$1_$2')
        .toLowerCase();

}

function toKebabCase(str: string): string {

    return str
        .replace(/[_\s]+/g, '-')
        .replace(/([a-z])([A-Z])/g, '$1-$2')
        .toLowerCase();

}

function toTitleCase(str: string): string {

    return str
        .replace(/[-_\s]+/g, ' ')
        .replace(/([a-z])([A-Z])/g, '$1 $2')
        .split(' ')
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join('');

}

// ─────────────────────────────────────────────────────────────
// Field Registration
// ─────────────────────────────────────────────────────────────

/**
 * Add case variations of field names to the masked set.
 *
 * Each field is also registered with the `pgbranch_` prefix so the
 * PGBRANCH_* environment variable names are caught.
 */
export function addMaskedFields(fields: string[]): void {

    for (const field of fields) {

        for (const variant of [field, `pgbranch_${field}`]) {

            MASKED_FIELDS.add(variant);
            MASKED_FIELDS.add(variant.toLowerCase());
            MASKED_FIELDS.add(variant.toUpperCase());
            MASKED_FIELDS.add(toCamelCase(variant));
            MASKED_FIELDS.add(toSnakeCase(variant));
            MASKED_FIELDS.add(toKebabCase(variant));
            MASKED_FIELDS.add(toTitleCase(variant));

        }

    }

}

addMaskedFields([
    'password',
    'pass',
    'secret',
    'token',
    'credential',
    'db_password',
    'database_password',
    'pgpassword',
]);

/**
 * Check if a field name should be masked.
 */
export function isMaskedField(key: string): boolean {

    return MASKED_FIELDS.has(key);

}

// ─────────────────────────────────────────────────────────────
// Masking
// ─────────────────────────────────────────────────────────────

/**
 * Mask a value with asterisks.
 *
 * Format: `<FieldName mask (length) />`. At verbose level the first
 * four characters stay visible.
 */
export function maskValue(value: string, prefix: string, level: LogLevel): string {

    const valueLen = value.length;
    const maskLen = Math.min(valueLen, MASK_MAX_LENGTH);

    let masked = '*'.repeat(maskLen);

    if (level === 'verbose' && valueLen >= 4) {

        masked = value.slice(0, 4) + '*'.repeat(Math.max(0, maskLen - 4));

    }

    if (valueLen > MASK_MAX_LENGTH) {

        masked += '...';

    }

    return `<${toTitleCase(prefix)} ${masked} (${valueLen}) />`;

}

// ─────────────────────────────────────────────────────────────
// Data Filtering
// ─────────────────────────────────────────────────────────────

/**
 * Recursively filter an object, masking sensitive string fields.
 *
 * Returns a copy; the input is never mutated.
 */
export function filterData(
    entry: Record<string, unknown>,
    level: LogLevel,
): Record<string, unknown> {

    const filtered: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(entry)) {

        if (MASKED_FIELDS.has(key) && typeof value === 'string') {

            filtered[key] = maskValue(value, key, level);

        }
        else if (value instanceof Error || value instanceof Date) {

            filtered[key] = value;

        }
        else if (Array.isArray(value)) {

            filtered[key] = value.map((item: unknown) =>
                isPlainRecord(item) ? filterData(item, level) : item,
            );

        }
        else if (isPlainRecord(value)) {

            filtered[key] = filterData(value, level);

        }
        else {

            filtered[key] = value;

        }

    }

    return filtered;

}

function isPlainRecord(value: unknown): value is Record<string, unknown> {

    return typeof value === 'object' && value !== null && !Array.isArray(value);

}
