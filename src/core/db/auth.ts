/**
 * Password resolution.
 *
 * Walks `database.auth.methods` in order and stops at the first method
 * that yields a password. `system` stops the walk with no password, for
 * peer or trust authentication.
 */
import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';

import { attemptSync } from '@logosdx/utils';

import type { AuthMethod, DatabaseConfig } from '../config/types.js';
import { observer } from '../observer.js';

/**
 * Asks the user for a password. Resolves null when none was given.
 */
export type PasswordPrompter = (message: string) => Promise<string | null>;

/**
 * Options for resolvePassword.
 */
export interface ResolvePasswordOptions {

    /** Environment to read PGPASSWORD from (defaults to process.env) */
    env?: NodeJS.ProcessEnv;

    /** Home directory for ~/.pgpass and ~/.pg_service.conf */
    homeDir?: string;

    /** Used by the `prompt` method */
    prompter?: PasswordPrompter;
}

/**
 * Outcome of password resolution.
 */
export interface ResolvedPassword {
    password: string | null;

    /** Method that decided, null when every method came up empty */
    method: AuthMethod | null;
}

/**
 * Connection parameters a pgpass line is matched against.
 */
export interface PgpassTarget {
    host: string;
    port: number;
    database: string;
    user: string;
}

/**
 * Split a pgpass line on unescaped colons, unescaping `\:` and `\\`.
 */
function splitPgpassLine(line: string): string[] {

    const fields: string[] = [];
    let current = '';

    for (let i = 0; i < line.length; i++) {

        const ch = line.charAt(i);

        if (ch === '\\' && i + 1 < line.length) {

            current += line.charAt(i + 1);
            i++;
            continue;

        }

        if (ch === ':') {

            fields.push(current);
            current = '';
            continue;

        }

        current += ch;

    }

    fields.push(current);

    return fields;

}

/**
 * Find the password for a connection in pgpass file content.
 *
 * Lines are `host:port:database:user:password`; `*` matches anything.
 *
 * @example
 * ```typescript
 * findPgpassPassword('localhost:5432:*:postgres:test-secret', {
 *     host: 'localhost', port: 5432, database: 'postgres', user: 'postgres',
 * })
 * // 'test-secret'
 * ```
 */
export function findPgpassPassword(content: string, target: PgpassTarget): string | null {

    for (const rawLine of content.split(/\r?\n/)) {

        const line = rawLine.trim();

        if (line === '' || line.startsWith('#')) continue;

        const fields = splitPgpassLine(line);

        if (fields.length !== 5) continue;

        const [host, port, database, user, password] = fields;
        const matches = (value: string | undefined, expected: string) => value === '*' || value === expected;

        if (
            matches(host, target.host)
            && matches(port, String(target.port))
            && matches(database, target.database)
            && matches(user, target.user)
        ) {

            return password ?? null;

        }

    }

    return null;

}

/**
 * Find the password of a named service in pg_service.conf content.
 *
 * @example
 * ```typescript
 * findServicePassword('[dev]\nhost=localhost\npassword=test-secret\n', 'dev')
 * // 'test-secret'
 * ```
 */
export function findServicePassword(content: string, service: string): string | null {

    let current: string | null = null;

    for (const rawLine of content.split(/\r?\n/)) {

        const line = rawLine.trim();

        if (line === '' || line.startsWith('#')) continue;

        if (line.startsWith('[') && line.endsWith(']')) {

            current = line.slice(1, -1).trim();
            continue;

        }

        if (current !== service) continue;

        const eq = line.indexOf('=');

        if (eq !== -1 && line.slice(0, eq).trim() === 'password') {

            return line.slice(eq + 1).trim();

        }

    }

    return null;

}

function readOptionalFile(path: string): string | null {

    if (!existsSync(path)) return null;

    const [content, err] = attemptSync(() => readFileSync(path, 'utf8'));

    if (err) {

        throw new Error(`Failed to read ${path}: ${err.message}`, { cause: err });

    }

    return content;

}

/**
 * Resolve the password to connect with.
 *
 * @throws Error when `service` is configured without `service_name` or
 *         when a password file exists but cannot be read
 *
 * @example
 * ```typescript
 * const { password, method } = await resolvePassword(config.database)
 * ```
 */
export async function resolvePassword(
    database: DatabaseConfig,
    options: ResolvePasswordOptions = {},
): Promise<ResolvedPassword> {

    const env = options.env ?? process.env;
    const home = options.homeDir ?? homedir();

    for (const method of database.auth.methods) {

        let password: string | null = null;

        switch (method) {

        case 'password':
            password = database.password;
            break;

        case 'environment':
            password = env['PGPASSWORD']
                ?? env[`PGPASSWORD_${database.host.toUpperCase()}`]
                ?? null;
            break;

        case 'pgpass': {
            const file = database.auth.pgpass_file ?? join(home, '.pgpass');
            const content = readOptionalFile(file);

            password = content === null
                ? null
                : findPgpassPassword(content, {
                    host: database.host,
                    port: database.port,
                    database: 'postgres',
                    user: database.user,
                });
            break;
        }

        case 'service': {
            const service = database.auth.service_name;

            if (!service) {

                throw new Error('Authentication method "service" requires database.auth.service_name');

            }

            const content = readOptionalFile(join(home, '.pg_service.conf'));

            password = content === null ? null : findServicePassword(content, service);
            break;
        }

        case 'prompt':
            if (database.auth.prompt_for_password && options.prompter) {

                password = await options.prompter(`Password for PostgreSQL user '${database.user}': `);

            }
            break;

        case 'system':
            observer.emit('db:auth', { method });

            return { password: null, method };

        }

        if (password !== null) {

            observer.emit('db:auth', { method });

            return { password, method };

        }

    }

    return { password: null, method: null };

}
