/**
 * Database lifecycle types.
 *
 * The branch manager talks to PostgreSQL through DatabaseOperations so
 * the lifecycle logic can run against an in-memory fake.
 */

/**
 * Connection parameters. Always against the `postgres` system database.
 */
export interface ServerConnection {
    host: string;
    port: number;
    user: string;
    password: string | null;
}

/**
 * A database row from pg_database.
 */
export interface DatabaseInfo {
    name: string;

    /** Creation order; newer databases have higher OIDs */
    oid: number;
}

/**
 * Server-level database operations.
 */
export interface DatabaseOperations {

    /**
     * Check the server answers.
     */
    ping(): Promise<void>;

    /**
     * Check if a database exists.
     */
    databaseExists(name: string): Promise<boolean>;

    /**
     * Create a database as a copy of `template`.
     */
    createDatabase(name: string, template: string): Promise<void>;

    /**
     * Drop a database, terminating other sessions on it first.
     */
    dropDatabase(name: string): Promise<void>;

    /**
     * Non-template databases whose name matches a LIKE pattern,
     * newest first.
     */
    listDatabases(likePattern: string): Promise<DatabaseInfo[]>;

    /**
     * Whether the connected role may create databases.
     */
    canCreateDatabases(): Promise<boolean>;

    /**
     * Release the connection.
     */
    close(): Promise<void>;
}

/**
 * Result of creating a branch database.
 */
export interface CreateBranchResult {
    database: string;

    /** False when the database already existed */
    created: boolean;
}

/**
 * Result of dropping a branch database.
 */
export interface DropBranchResult {
    database: string;

    /** False when the database did not exist */
    dropped: boolean;
}

/**
 * Error thrown when a database operation fails.
 */
export class DatabaseError extends Error {

    constructor(
        message: string,
        public readonly database: string | null,
        cause?: Error,
    ) {

        super(message, { cause });
        this.name = 'DatabaseError';

    }

}
