/**
 * Docker Compose detection tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';

import {
    findComposeFiles,
    parsePostgresFromCompose,
    publishedPostgresPort,
    readComposeEnvironment,
} from '../../../src/core/docker/compose.js';
import { observer } from '../../../src/core/observer.js';

describe('docker: compose', () => {

    describe('publishedPostgresPort', () => {

        it('should read short syntax', () => {

            expect(publishedPostgresPort(['5433:5432'])).toBe(5433);
            expect(publishedPostgresPort(['127.0.0.1:5434:5432/tcp'])).toBe(5434);
            expect(publishedPostgresPort(['5432'])).toBe(5432);
            expect(publishedPostgresPort([5432])).toBe(5432);

        });

        it('should read long syntax', () => {

            expect(publishedPostgresPort([{ target: 5432, published: 6543 }])).toBe(6543);
            expect(publishedPostgresPort([{ target: 5432 }])).toBe(5432);

        });

        it('should skip other container ports', () => {

            expect(publishedPostgresPort(['8080:80', { target: 6379, published: 6379 }])).toBeUndefined();
            expect(publishedPostgresPort(['8080:80', '15432:5432'])).toBe(15432);
            expect(publishedPostgresPort([])).toBeUndefined();

        });

    });

    describe('readComposeEnvironment', () => {

        it('should read the map form', () => {

            expect(readComposeEnvironment({ POSTGRES_USER: 'app', PORT: 5432, EMPTY: null, FLAG: true })).toEqual({
                POSTGRES_USER: 'app',
                PORT: '5432',
                FLAG: 'true',
            });

        });

        it('should read the list form', () => {

            expect(readComposeEnvironment(['POSTGRES_USER=app', 'POSTGRES_PASSWORD=a=b', 'NO_VALUE'])).toEqual({
                POSTGRES_USER: 'app',
                POSTGRES_PASSWORD: 'a=b',
            });

        });

        it('should read nothing from an absent block', () => {

            expect(readComposeEnvironment(undefined)).toEqual({});

        });

    });

    describe('detection', () => {

        let dir: string;
        const cleanups: Array<() => void> = [];

        beforeEach(() => {

            dir = mkdtempSync(join(process.cwd(), 'tmp', 'pgbranch-test-'));

        });

        afterEach(() => {

            for (const cleanup of cleanups.splice(0)) cleanup();

            rmSync(dir, { recursive: true, force: true });

        });

        it('should list compose files in lookup order', () => {

            writeFileSync(join(dir, 'compose.yaml'), '');
            writeFileSync(join(dir, 'docker-compose.yml'), '');

            expect(findComposeFiles(dir)).toEqual([join(dir, 'docker-compose.yml'), join(dir, 'compose.yaml')]);

        });

        it('should pick the first postgres service', () => {

            const file = join(dir, 'docker-compose.yml');

            writeFileSync(file, [
                'services:',
                '  web:',
                '    image: node:20',
                '    ports:',
                '      - "3000:3000"',
                '  db:',
                '    image: postgres:16-alpine',
                '    ports:',
                '      - "5433:5432"',
                '    environment:',
                '      POSTGRES_USER: app',
                '      POSTGRES_PASSWORD: test-secret',
                '      POSTGRES_DB: app_dev',
                '',
            ].join('\n'));

            const detected: string[] = [];

            cleanups.push(observer.on('compose:detected', ({ service }) => {

                detected.push(service);

            }));

            expect(parsePostgresFromCompose([file])).toEqual({
                file,
                service: 'db',
                host: 'localhost',
                port: 5433,
                user: 'app',
                password: 'test-secret',
                database: 'app_dev',
            });
            expect(detected).toEqual(['db']);

        });

        it('should accept postgis images and leave unset values out', () => {

            const file = join(dir, 'compose.yml');

            writeFileSync(file, 'services:\n  gis:\n    image: PostGIS/postgis:15\n');

            expect(parsePostgresFromCompose([file])).toEqual({ file, service: 'gis', host: 'localhost' });

        });

        it('should skip invalid files and keep looking', () => {

            const broken = join(dir, 'docker-compose.yml');
            const good = join(dir, 'compose.yml');
            const invalid: string[] = [];

            cleanups.push(observer.on('compose:invalid', ({ path }) => {

                invalid.push(path);

            }));

            writeFileSync(broken, 'services: [unclosed\n');
            writeFileSync(good, 'services:\n  pg:\n    image: postgres\n    environment:\n      - POSTGRES_USER=list\n');

            expect(parsePostgresFromCompose([broken, good])).toEqual({
                file: good,
                service: 'pg',
                host: 'localhost',
                user: 'list',
            });
            expect(invalid).toEqual([broken]);

        });

        it('should report a file whose services do not match the schema', () => {

            const file = join(dir, 'compose.yml');
            const invalid: string[] = [];

            cleanups.push(observer.on('compose:invalid', ({ path }) => {

                invalid.push(path);

            }));

            writeFileSync(file, 'services:\n  db:\n    image: 42\n');

            expect(parsePostgresFromCompose([file])).toBeNull();
            expect(invalid).toEqual([file]);

        });

        it('should return null without a postgres service', () => {

            const file = join(dir, 'compose.yml');

            writeFileSync(file, 'services:\n  cache:\n    image: redis:7\n  empty:\n');

            expect(parsePostgresFromCompose([file])).toBeNull();
            expect(parsePostgresFromCompose([])).toBeNull();

        });

    });

});
