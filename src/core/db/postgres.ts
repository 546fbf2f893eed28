/**
 * PostgreSQL implementation of DatabaseOperations.
 *
 * Connects to the `postgres` system database with the 'pg' package
 * through Kysely.
 */
import { Kysely, PostgresDialect, sql } from 'kysely';

import type { DatabaseInfo, DatabaseOperations, ServerConnection } from './types.js';

/**
 * System database every connection goes to.
 */
export const SYSTEM_DATABASE = 'postgres';

/**
 * Open a connection to the server.
 *
 * @example
 * ```typescript
 * const ops = await createPostgresOperations({
 *     host: 'localhost',
 *     port: 5432,
 *     user: 'postgres',
 *     password: 'test-secret',
 * })
 *
 * await ops.ping()
 * await ops.close()
 * ```
 */
export async function createPostgresOperations(
    connection: ServerConnection,
): Promise<DatabaseOperations> {

    // Loaded on first connection
    const pg = await import('pg');
    const Pool = pg.default?.Pool ?? pg.Pool;

    const pool = new Pool({
        host: connection.host,
        port: connection.port,
        user: connection.user,
        password: connection.password ?? undefined,
        database: SYSTEM_DATABASE,
        min: 0,
        max: 1,
    });

    const db = new Kysely<unknown>({
        dialect: new PostgresDialect({ pool }),
    });

    return {
        async ping(): Promise<void> {

            await sql`SELECT 1`.execute(db);

        },

        async databaseExists(name: string): Promise<boolean> {

            const result = await sql<{ found: number }>`
                SELECT 1 AS found FROM pg_database WHERE datname = ${name}
            `.execute(db);

            return result.rows.length > 0;

        },

        async createDatabase(name: string, template: string): Promise<void> {

            await sql`CREATE DATABASE ${sql.id(name)} WITH TEMPLATE ${sql.id(template)}`.execute(db);

        },

        async dropDatabase(name: string): Promise<void> {

            // Terminate existing connections first
            await sql`
                SELECT pg_terminate_backend(pg_stat_activity.pid)
                FROM pg_stat_activity
                WHERE pg_stat_activity.datname = ${name}
                AND pid <> pg_backend_pid()
            `.execute(db);

            await sql`DROP DATABASE IF EXISTS ${sql.id(name)}`.execute(db);

        },

        async listDatabases(likePattern: string): Promise<DatabaseInfo[]> {

            const result = await sql<{ datname: string; oid: number | string }>`
                SELECT datname, oid
                FROM pg_database
                WHERE datistemplate = false
                AND datname LIKE ${likePattern}
                ORDER BY oid DESC
            `.execute(db);

            return result.rows.map((row) => ({ name: row.datname, oid: Number(row.oid) }));

        },

        async canCreateDatabases(): Promise<boolean> {

            const result = await sql<{ can_create: boolean }>`
                SELECT (rolcreatedb OR rolsuper) AS can_create
                FROM pg_roles
                WHERE rolname = current_user
            `.execute(db);

            return result.rows[0]?.can_create ?? false;

        },

        close: () => db.destroy(),
    };

}
