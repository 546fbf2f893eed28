/**
 * Config file discovery and loading.
 *
 * The base file is found by walking up from an explicit starting
 * directory. The local overlay sits next to the base file, or in the
 * working directory when there is no base file.
 */
import { readFileSync, statSync, writeFileSync } from 'node:fs'
import { dirname, join, resolve } from 'node:path'

import { attemptSync } from '@logosdx/utils'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'

import { observer } from '../observer.js'
import { CONFIG_FILE_NAMES, LOCAL_CONFIG_FILE_NAME, createDefaultConfig } from './defaults.js'
import { parseBaseConfig, parseLocalOverlay } from './schema.js'
import type { BaseConfig, LocalOverlay } from './types.js'


/**
 * Error thrown when a config file cannot be read or is not valid YAML.
 */
export class ConfigFileError extends Error {

    constructor(
        message: string,
        public readonly path: string,
        cause?: Error,
    ) {

        super(message, { cause })
        this.name = 'ConfigFileError'
    }
}


/**
 * Result of loading the base config.
 */
export interface LoadedConfig {

    config: BaseConfig

    /** Absolute path of the file, or null when defaults were used */
    path: string | null
}


function isFile(path: string): boolean {

    const [stat] = attemptSync(() => statSync(path))

    return stat?.isFile() ?? false
}


/**
 * Read and YAML-parse a file. Empty documents yield null.
 */
function readYamlFile(path: string): unknown {

    const [content, readErr] = attemptSync(() => readFileSync(path, 'utf-8'))

    if (readErr) {

        throw new ConfigFileError(`Failed to read ${path}: ${readErr.message}`, path, readErr)
    }

    const [parsed, yamlErr] = attemptSync((): unknown => parseYaml(content))

    if (yamlErr) {

        throw new ConfigFileError(`Invalid YAML in ${path}: ${yamlErr.message}`, path, yamlErr)
    }

    return parsed ?? null
}


/**
 * Find the base config file.
 *
 * Checks `.pgbranch.yml` then `.pgbranch.yaml` in `startDir`, then in each
 * parent up to the filesystem root.
 *
 * @example
 * ```typescript
 * const path = findConfigFile(process.cwd())
 * // '/home/dev/project/.pgbranch.yml' or null
 * ```
 */
export function findConfigFile(startDir: string): string | null {

    let dir = resolve(startDir)

    for (;;) {

        for (const name of CONFIG_FILE_NAMES) {

            const candidate = join(dir, name)

            if (isFile(candidate)) {

                return candidate
            }
        }

        const parent = dirname(dir)

        if (parent === dir) {

            return null
        }

        dir = parent
    }
}


/**
 * Load and validate a base config file.
 *
 * An empty file yields the default configuration. A legacy
 * `current_branch` key is dropped with a `config:deprecated` event.
 *
 * @throws ConfigFileError if the file cannot be read or parsed
 * @throws ConfigValidationError if the document does not match the schema
 */
export function loadConfigFile(path: string): BaseConfig {

    const raw = readYamlFile(path)

    if (raw === null) {

        observer.emit('config:loaded', { path, source: 'base' })

        return createDefaultConfig()
    }

    if (typeof raw === 'object' && 'current_branch' in raw) {

        observer.emit('config:deprecated', { path, field: 'current_branch' })
    }

    const config = parseBaseConfig(raw, path)

    observer.emit('config:loaded', { path, source: 'base' })

    return config
}


/**
 * Discover and load the base config.
 *
 * Falls back to defaults (with `path: null`) when no file is found.
 * Callers that need a file decide whether that is fatal.
 *
 * @example
 * ```typescript
 * const { config, path } = loadBaseConfig(process.cwd())
 *
 * if (!path) {
 *     console.error('No .pgbranch.yml found. Run: pgbranch init')
 * }
 * ```
 */
export function loadBaseConfig(startDir: string): LoadedConfig {

    const path = findConfigFile(startDir)

    if (!path) {

        observer.emit('config:defaulted', { cwd: resolve(startDir) })

        return { config: createDefaultConfig(), path: null }
    }

    return { config: loadConfigFile(path), path }
}


/**
 * Write a base config as YAML.
 *
 * @throws ConfigFileError if the file cannot be written
 */
export function saveConfigFile(path: string, config: BaseConfig): void {

    const yaml = stringifyYaml(config, { indent: 2, lineWidth: 120 })

    const [, writeErr] = attemptSync(() => writeFileSync(path, yaml, 'utf-8'))

    if (writeErr) {

        throw new ConfigFileError(`Failed to write ${path}: ${writeErr.message}`, path, writeErr)
    }

    observer.emit('config:saved', { path })
}


/**
 * Locate the local overlay file.
 *
 * Looks in the base config's directory, or in `cwd` when there is no
 * base config.
 */
export function findLocalConfigFile(baseConfigPath: string | null, cwd: string): string | null {

    const dir = baseConfigPath ? dirname(baseConfigPath) : resolve(cwd)
    const candidate = join(dir, LOCAL_CONFIG_FILE_NAME)

    return isFile(candidate) ? candidate : null
}


/**
 * Load a local overlay file.
 *
 * @throws ConfigFileError if the file cannot be read or parsed
 * @throws ConfigValidationError if the document does not match the schema
 */
export function loadLocalConfigFile(path: string): LocalOverlay {

    const raw = readYamlFile(path)
    const overlay = parseLocalOverlay(raw, path)

    observer.emit('config:loaded', { path, source: 'local' })

    return overlay
}


/**
 * Discover and load the local overlay. Absence is not an error.
 *
 * @example
 * ```typescript
 * const local = loadLocalConfig(basePath, process.cwd())
 *
 * if (local?.disabled) {
 *     // this checkout opted out
 * }
 * ```
 */
export function loadLocalConfig(baseConfigPath: string | null, cwd: string): LocalOverlay | null {

    const path = findLocalConfigFile(baseConfigPath, cwd)

    return path ? loadLocalConfigFile(path) : null
}
