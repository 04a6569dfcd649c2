import { describe, it, expect, beforeEach } from 'vitest';
import { ServerResponse } from 'http';
import { Router, RouteParams } from '../Router.js';
import { createRequest } from '../../tests/httpTestUtils.js';

describe('Router', () => {
    let router: Router;
    let captured: RouteParams | undefined;

    const dispatch = (method: string, url: string): Promise<boolean> => {
        const req = createRequest(method, url);
        return router.handle(req, new ServerResponse(req));
    };

    beforeEach(() => {
        captured = undefined;
        router = new Router();
        router.post('/activities/:activityName/signup', async (_req, _res, params) => {
            captured = params;
        });
        router.get('/static/*path', async (_req, _res, params) => {
            captured = params;
        });
    });

    it('should decode path parameters containing spaces', async () => {
        const handled = await dispatch('POST', '/activities/Chess%20Club/signup?email=a%40b.edu');

        expect(handled).toBe(true);
        expect(captured).toEqual({
            params: { activityName: 'Chess Club' },
            query: { email: 'a@b.edu' },
        });
    });

    it('should read + in the query string as a space', async () => {
        await dispatch('POST', '/activities/Art%20Club/signup?note=see+you&email=x%2By%40b.edu');

        expect(captured?.query).toEqual({ note: 'see you', email: 'x+y@b.edu' });
    });

    it('should keep = inside query values', async () => {
        await dispatch('POST', '/activities/Soccer/signup?token=a=b');

        expect(captured?.query).toEqual({ token: 'a=b' });
    });

    it('should not match a different method', async () => {
        const handled = await dispatch('GET', '/activities/Soccer/signup');

        expect(handled).toBe(false);
        expect(captured).toBeUndefined();
    });

    it('should not match extra path segments', async () => {
        const handled = await dispatch('POST', '/activities/Soccer/signup/extra');

        expect(handled).toBe(false);
    });

    it('should capture the rest of the path for wildcard parameters', async () => {
        await dispatch('GET', '/static/css/site.css?v=2');

        expect(captured).toEqual({
            params: { path: 'css/site.css' },
            query: { v: '2' },
        });
    });

    it('should keep malformed escapes as raw text', async () => {
        await dispatch('POST', '/activities/%E0%A4%A/signup');

        expect(captured?.params.activityName).toBe('%E0%A4%A');
    });

    it('should apply the prefix to every route', async () => {
        const prefixed = new Router('/api');
        let hit = false;
        prefixed.get('/ping', async () => {
            hit = true;
        });

        const req = createRequest('GET', '/api/ping');
        expect(await prefixed.handle(req, new ServerResponse(req))).toBe(true);
        expect(hit).toBe(true);
    });

    it('should refuse a wildcard before the last segment', () => {
        expect(() => new Router().get('/files/*path/raw', async () => {}))
            .toThrow('Wildcard *path must be the last segment of /files/*path/raw');
    });
});
