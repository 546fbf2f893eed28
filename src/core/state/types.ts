/**
 * Local state types.
 *
 * Local state records which logical branch each checkout is on. It lives
 * outside the repository so it is never committed.
 */
import { z } from 'zod'


/**
 * Current on-disk layout version.
 */
export const LOCAL_STATE_VERSION = 1


/**
 * State kept for one base config file.
 */
export interface RepositoryState {

    /** Logical branch, `_main` for the template database */
    current_branch: string | null

    /** ISO-8601 time of the last write */
    updated_at: string
}


/**
 * The whole state file, keyed by absolute base config path.
 *
 * @example
 * ```json
 * {
 *   "version": 1,
 *   "repositories": {
 *     "/home/dev/app/.pgbranch.yml": {
 *       "current_branch": "feature_login",
 *       "updated_at": "2024-05-01T10:00:00.000Z"
 *     }
 *   }
 * }
 * ```
 */
export interface LocalState {

    version: number
    repositories: Record<string, RepositoryState>
}


export const LocalStateSchema = z.object({
    version: z.number().int(),
    repositories: z.record(z.object({
        current_branch: z.string().nullable(),
        updated_at: z.string(),
    })),
})


/**
 * Create an empty state.
 */
export function createEmptyState(): LocalState {

    return {
        version: LOCAL_STATE_VERSION,
        repositories: {},
    }
}
