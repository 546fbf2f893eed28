/**
 * Docker Compose detection.
 *
 * Reads compose files in a project directory and picks up the connection
 * settings of the first PostgreSQL service, so `init --from-compose` can
 * prefill the base configuration.
 */
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';

import { attemptSync } from '@logosdx/utils';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { observer } from '../observer.js';

export const COMPOSE_FILE_NAMES = [
    'docker-compose.yml',
    'docker-compose.yaml',
    'compose.yml',
    'compose.yaml',
] as const;

const POSTGRES_PORT = 5432;

/**
 * Connection settings found in a compose file. Absent keys were not set.
 */
export interface ComposePostgresConfig {
    file: string;
    service: string;
    host: string;
    port?: number;
    user?: string;
    password?: string;
    database?: string;
}

// ─────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────

const PortSchema = z.union([
    z.string(),
    z.number(),
    z.object({
        target: z.coerce.number(),
        published: z.coerce.number().optional(),
    }),
]);

const ServiceSchema = z.object({
    image: z.string().optional(),
    ports: z.array(PortSchema).optional(),
    environment: z
        .union([
            z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()])),
            z.array(z.string()),
        ])
        .optional(),
});

const ComposeSchema = z.object({
    services: z.record(z.string(), ServiceSchema.nullable()).optional(),
});

type ComposeService = z.infer<typeof ServiceSchema>;
type ComposePort = z.infer<typeof PortSchema>;

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

/**
 * Host port published for the container's 5432.
 *
 * @example
 * ```typescript
 * publishedPostgresPort(['5433:5432'])                        // 5433
 * publishedPostgresPort(['127.0.0.1:5434:5432/tcp'])          // 5434
 * publishedPostgresPort([{ target: 5432, published: 6543 }])  // 6543
 * publishedPostgresPort(['8080:80'])                          // undefined
 * ```
 */
export function publishedPostgresPort(ports: readonly ComposePort[]): number | undefined {

    for (const port of ports) {

        if (typeof port === 'object') {

            if (port.target === POSTGRES_PORT) return port.published ?? POSTGRES_PORT;

            continue;

        }

        const parts = String(port).replace(/\/(tcp|udp)$/, '').split(':');
        const container = Number(parts[parts.length - 1]);

        if (container !== POSTGRES_PORT) continue;

        if (parts.length === 1) return POSTGRES_PORT;

        const published = Number(parts[parts.length - 2]);

        if (Number.isInteger(published) && published > 0) return published;

    }

    return undefined;

}

/**
 * Normalize a compose `environment` block to a map.
 */
export function readComposeEnvironment(environment: ComposeService['environment']): Record<string, string> {

    const result: Record<string, string> = {};

    if (!environment) return result;

    if (Array.isArray(environment)) {

        for (const entry of environment) {

            const separator = entry.indexOf('=');

            if (separator === -1) continue;

            result[entry.slice(0, separator)] = entry.slice(separator + 1);

        }

        return result;

    }

    for (const [key, value] of Object.entries(environment)) {

        if (value !== null) result[key] = String(value);

    }

    return result;

}

function isPostgresImage(image: string | undefined): boolean {

    if (!image) return false;

    const lower = image.toLowerCase();

    return lower.includes('postgres') || lower.includes('postgis');

}

// ─────────────────────────────────────────────────────────────
// Detection
// ─────────────────────────────────────────────────────────────

/**
 * Compose files present in a directory, in lookup order.
 */
export function findComposeFiles(dir: string): string[] {

    return COMPOSE_FILE_NAMES
        .map((name) => join(dir, name))
        .filter((path) => existsSync(path));

}

/**
 * Find the first PostgreSQL service across compose files.
 *
 * Unreadable or malformed files are reported as `compose:invalid` and
 * skipped.
 *
 * @returns the service's settings, or null when none is found
 */
export function parsePostgresFromCompose(files: readonly string[]): ComposePostgresConfig | null {

    for (const file of files) {

        const [raw, readErr] = attemptSync((): unknown => parseYaml(readFileSync(file, 'utf8')));

        if (readErr) {

            observer.emit('compose:invalid', { path: file, error: readErr.message });
            continue;

        }

        const parsed = ComposeSchema.safeParse(raw ?? {});

        if (!parsed.success) {

            observer.emit('compose:invalid', { path: file, error: parsed.error.message });
            continue;

        }

        for (const [service, definition] of Object.entries(parsed.data.services ?? {})) {

            if (!definition || !isPostgresImage(definition.image)) continue;

            const env = readComposeEnvironment(definition.environment);
            const port = publishedPostgresPort(definition.ports ?? []);

            const found: ComposePostgresConfig = { file, service, host: 'localhost' };

            if (port !== undefined) found.port = port;
            if (env['POSTGRES_USER']) found.user = env['POSTGRES_USER'];
            if (env['POSTGRES_PASSWORD']) found.password = env['POSTGRES_PASSWORD'];
            if (env['POSTGRES_DB']) found.database = env['POSTGRES_DB'];

            observer.emit('compose:detected', { path: file, service });

            return found;

        }

    }

    return null;

}
