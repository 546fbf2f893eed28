/**
 * Docker Compose detection.
 */
export {
    COMPOSE_FILE_NAMES,
    findComposeFiles,
    parsePostgresFromCompose,
    publishedPostgresPort,
    readComposeEnvironment,
    type ComposePostgresConfig,
} from './compose.js';
