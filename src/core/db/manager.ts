/**
 * Branch database lifecycle.
 *
 * Maps logical branches to database names and creates, drops, lists and
 * prunes branch databases through a DatabaseOperations connection.
 */
import { attempt } from '@logosdx/utils';

import { extractBranchName, getDatabaseName } from '../branch/naming.js';
import type { BaseConfig } from '../config/types.js';
import { observer } from '../observer.js';
import { resolvePassword, type ResolvePasswordOptions } from './auth.js';
import { createPostgresOperations } from './postgres.js';
import type {
    CreateBranchResult,
    DatabaseOperations,
    DropBranchResult,
    ServerConnection,
} from './types.js';
import { DatabaseError } from './types.js';

/**
 * Escape LIKE wildcards so a prefix matches literally.
 */
export function escapeLikePattern(value: string): string {

    return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);

}

/**
 * LIKE pattern selecting the databases of the configured naming strategy.
 *
 * Replace names carry no marker, so that strategy falls back to the
 * prefix pattern: listing and cleanup never reach a database whose name
 * pgbranch cannot have chosen.
 *
 * @example
 * ```typescript
 * buildBranchLikePattern(config)  // 'pgbranch\_%' for the prefix strategy
 * ```
 */
export function buildBranchLikePattern(config: BaseConfig): string {

    const prefix = escapeLikePattern(config.database.database_prefix);

    switch (config.behavior.naming_strategy) {

    case 'prefix':
    case 'replace':
        return `${prefix}\\_%`;

    case 'suffix':
        return `%\\_${prefix}`;

    }

}

function toError(err: unknown): Error {

    return err instanceof Error ? err : new Error(String(err));

}

/**
 * Branch database manager.
 *
 * @example
 * ```typescript
 * const manager = await DatabaseManager.connect(config)
 *
 * await manager.createDatabaseBranch('feature/login')
 * const branches = await manager.listDatabaseBranches()
 *
 * await manager.close()
 * ```
 *
 * @example
 * ```typescript
 * // With an in-memory fake in tests
 * const manager = new DatabaseManager(config, fakeOperations)
 * ```
 */
export class DatabaseManager {

    readonly #config: BaseConfig;
    readonly #ops: DatabaseOperations;

    constructor(config: BaseConfig, ops: DatabaseOperations) {

        this.#config = config;
        this.#ops = ops;

    }

    /**
     * Resolve a password and connect to the server.
     */
    static async connect(
        config: BaseConfig,
        options: ResolvePasswordOptions = {},
    ): Promise<DatabaseManager> {

        const { password } = await resolvePassword(config.database, options);

        const connection: ServerConnection = {
            host: config.database.host,
            port: config.database.port,
            user: config.database.user,
            password,
        };

        const ops = await createPostgresOperations(connection);

        return new DatabaseManager(config, ops);

    }

    /**
     * Database name of a logical branch.
     */
    getDatabaseName(branch: string): string {

        return getDatabaseName(branch, this.#config);

    }

    /**
     * Run an operation, wrapping failures in DatabaseError.
     */
    async #run<T>(database: string | null, action: string, fn: () => Promise<T>): Promise<T> {

        const [result, err] = await attempt(fn);

        if (err) {

            const error = toError(err);

            observer.emit('db:error', { database: database ?? '', error: error.message });

            throw new DatabaseError(`Failed to ${action}: ${error.message}`, database, error);

        }

        return result;

    }

    /**
     * Create the database of a branch from the template.
     *
     * A no-op when it already exists.
     */
    async createDatabaseBranch(branch: string): Promise<CreateBranchResult> {

        const database = this.getDatabaseName(branch);
        const template = this.#config.database.template_database;

        if (database === template) {

            return { database, created: false };

        }

        const exists = await this.#run(database, `check database ${database}`, () => this.#ops.databaseExists(database));

        if (exists) {

            observer.emit('db:exists', { database });

            return { database, created: false };

        }

        observer.emit('db:creating', { database, template });

        const start = performance.now();

        await this.#run(database, `create database ${database}`, () => this.#ops.createDatabase(database, template));

        observer.emit('db:created', { database, durationMs: performance.now() - start });

        return { database, created: true };

    }

    /**
     * Drop the database of a branch. A no-op when it does not exist.
     *
     * @throws DatabaseError when the branch maps to the template database
     */
    async dropDatabaseBranch(branch: string): Promise<DropBranchResult> {

        const database = this.getDatabaseName(branch);

        if (database === this.#config.database.template_database) {

            throw new DatabaseError(`Refusing to drop the template database ${database}`, database);

        }

        const exists = await this.#run(database, `check database ${database}`, () => this.#ops.databaseExists(database));

        if (!exists) {

            observer.emit('db:missing', { database });

            return { database, dropped: false };

        }

        await this.#dropByName(database);

        return { database, dropped: true };

    }

    async #dropByName(database: string): Promise<void> {

        observer.emit('db:dropping', { database });

        await this.#run(database, `drop database ${database}`, () => this.#ops.dropDatabase(database));

        observer.emit('db:dropped', { database });

    }

    /**
     * Branch databases, newest first, as the sanitized branch part of
     * their names.
     */
    async listDatabaseBranches(): Promise<string[]> {

        const databases = await this.#listBranchDatabases();

        return databases
            .map((name) => extractBranchName(name, this.#config))
            .filter((name): name is string => name !== null && name !== '');

    }

    async #listBranchDatabases(): Promise<string[]> {

        const pattern = buildBranchLikePattern(this.#config);
        const rows = await this.#run(null, 'list databases', () => this.#ops.listDatabases(pattern));
        const template = this.#config.database.template_database;

        return [...rows]
            .sort((a, b) => b.oid - a.oid)
            .map((row) => row.name)
            .filter((name) => name !== template && name !== 'postgres');

    }

    /**
     * Keep the `maxCount` newest branch databases, drop the rest.
     *
     * @returns the dropped database names
     */
    async cleanupOldBranches(maxCount: number): Promise<string[]> {

        const databases = await this.#listBranchDatabases();
        const stale = databases.slice(Math.max(0, maxCount));

        for (const database of stale) {

            await this.#dropByName(database);

        }

        observer.emit('db:cleaned', { kept: databases.length - stale.length, dropped: [...stale] });

        return stale;

    }

    /**
     * Whether the server answers.
     */
    async testConnection(): Promise<boolean> {

        const [, err] = await attempt(() => this.#ops.ping());

        return !err;

    }

    /**
     * Whether a database exists, by exact name.
     */
    async databaseExists(database: string): Promise<boolean> {

        return this.#run(database, `check database ${database}`, () => this.#ops.databaseExists(database));

    }

    /**
     * Whether the role may create databases.
     */
    async canCreateDatabases(): Promise<boolean> {

        return this.#run(null, 'check CREATEDB privilege', () => this.#ops.canCreateDatabases());

    }

    /**
     * Close the connection.
     */
    async close(): Promise<void> {

        await this.#ops.close();

    }

}
