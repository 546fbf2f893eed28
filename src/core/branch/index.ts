/**
 * Branch module - naming and classification of git branches.
 */
export {
    MAX_DATABASE_NAME_BYTES,
    sanitizeBranchName,
    getNormalizedBranchName,
    hashName,
    ensureValidPostgresName,
    getDatabaseName,
    extractBranchName,
} from './naming.js';

export {
    shouldCreateBranch,
    shouldSwitchOnBranch,
    isMainBranch,
    classifyBranch,
    type BranchAction,
} from './classifier.js';
