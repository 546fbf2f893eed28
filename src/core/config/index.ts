/**
 * Config module - configuration resolution for pgbranch.
 *
 * Handles discovery and loading of the base and local files, the
 * PGBRANCH_* environment overlay and the merge into an EffectiveConfig.
 */

// Types
export * from './types.js';

// Defaults
export {
    CONFIG_FILE_NAMES,
    LOCAL_CONFIG_FILE_NAME,
    MAIN_BRANCH_SENTINEL,
    DEFAULT_AUTH_METHODS,
    DEFAULT_CONFIG,
    createDefaultConfig,
} from './defaults.js';

// Schema & Validation
export {
    BaseConfigSchema,
    LocalOverlaySchema,
    PostCommandSchema,
    ShellCommandSchema,
    ReplaceCommandSchema,
    NamingStrategySchema,
    AuthMethodSchema,
    ConfigValidationError,
    parseBaseConfig,
    parseLocalOverlay,
    parsePostCommand,
} from './schema.js';

export { validateResolvedConfig, type ConfigProblem } from './validate.js';

// Loading
export {
    ConfigFileError,
    findConfigFile,
    loadConfigFile,
    loadBaseConfig,
    saveConfigFile,
    findLocalConfigFile,
    loadLocalConfigFile,
    loadLocalConfig,
    type LoadedConfig,
} from './loader.js';

// Environment variables
export {
    ENV_VARIABLES,
    EnvParseError,
    getEnvOverlay,
    parseBooleanEnv,
    parsePortEnv,
    parseListEnv,
} from './env.js';

// Patterns
export {
    compilePattern,
    globToRegexSource,
    matchesBranchPattern,
    matchesAnyBranchPattern,
} from './patterns.js';

// Resolver
export {
    EffectiveConfig,
    loadEffectiveConfig,
    type EffectiveConfigOptions,
    type LoadEffectiveConfigOptions,
    type LoadedEffectiveConfig,
} from './resolver.js';
