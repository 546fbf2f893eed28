/**
 * Core module exports.
 *
 * Everything the CLI needs comes from this barrel. The core never prints:
 * it emits observer events the logger turns into lines.
 */

// Observer
export { observer } from './observer.js';
export type { PgbranchEvents, PgbranchEventNames, PgbranchEventCallback } from './observer.js';

// Environment
export { isCi, isDebug, getLogLevel } from './environment.js';

export * from './config/index.js';
export * from './branch/index.js';
export * from './state/index.js';
export * from './git/index.js';
export * from './db/index.js';
export * from './template/index.js';
export * from './post-commands/index.js';
export * from './docker/index.js';
export * from './sync/index.js';
export * from './logger/index.js';
