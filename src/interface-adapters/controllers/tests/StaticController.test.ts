import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { StaticController } from '../StaticController.js';
import { DEFAULT_APP_CONFIG } from '../../../infrastructure/config/AppConfig.js';
import { NullLogger } from '../../../infrastructure/observability/Logger.js';
import { AppContainer } from '../../../AppContainer.js';
import { sendRequest, parseJson } from '../../tests/httpTestUtils.js';

describe('StaticController', () => {
    const router = new AppContainer(DEFAULT_APP_CONFIG, {}, { logger: new NullLogger() }).appRouter;

    it('should serve the index page as HTML', async () => {
        const response = await sendRequest(router, 'GET', '/static/index.html');

        expect(response.statusCode).toBe(200);
        expect(response.header('content-type')).toBe('text/html; charset=utf-8');
        expect(response.body).toContain('<title>Mergington High School Activities</title>');
    });

    it('should pick the content type from the extension', async () => {
        const response = await sendRequest(router, 'GET', '/static/styles.css');

        expect(response.header('content-type')).toBe('text/css; charset=utf-8');
    });

    it('should return 404 for missing files', async () => {
        const response = await sendRequest(router, 'GET', '/static/missing.css');

        expect(response.statusCode).toBe(404);
        expect(parseJson<{ detail: string }>(response)).toEqual({ detail: 'Not Found' });
    });

    it('should refuse paths that leave the static directory', async () => {
        const encoded = await sendRequest(router, 'GET', '/static/..%2Fpackage.json');
        const raw = await sendRequest(router, 'GET', '/static/../package.json');

        expect(encoded.statusCode).toBe(404);
        expect(raw.statusCode).toBe(404);
    });

    describe('resolveInsideRoot', () => {
        const root = join('/srv', 'static');
        const scoped = new StaticController(root);

        it('should resolve nested files under the root', () => {
            expect(scoped.resolveInsideRoot('css/site.css')).toBe(join(root, 'css', 'site.css'));
        });

        it('should treat absolute request paths as relative to the root', () => {
            expect(scoped.resolveInsideRoot('/etc/passwd')).toBe(join(root, 'etc', 'passwd'));
        });

        it('should reject traversal', () => {
            expect(scoped.resolveInsideRoot('../etc/passwd')).toBeNull();
            expect(scoped.resolveInsideRoot('..')).toBeNull();
        });
    });
});
