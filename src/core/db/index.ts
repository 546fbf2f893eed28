/**
 * Database module.
 *
 * Branch database lifecycle against PostgreSQL and password resolution.
 *
 * @example
 * ```typescript
 * import { DatabaseManager } from './db'
 *
 * const manager = await DatabaseManager.connect(config)
 * await manager.createDatabaseBranch('feature/login')
 * await manager.close()
 * ```
 */

// Manager
export { DatabaseManager, buildBranchLikePattern, escapeLikePattern } from './manager.js';

// Password resolution
export {
    resolvePassword,
    findPgpassPassword,
    findServicePassword,
    type PasswordPrompter,
    type ResolvePasswordOptions,
    type ResolvedPassword,
    type PgpassTarget,
} from './auth.js';

// PostgreSQL connection
export { createPostgresOperations, SYSTEM_DATABASE } from './postgres.js';

// Types
export {
    DatabaseError,
    type DatabaseOperations,
    type DatabaseInfo,
    type ServerConnection,
    type CreateBranchResult,
    type DropBranchResult,
} from './types.js';
