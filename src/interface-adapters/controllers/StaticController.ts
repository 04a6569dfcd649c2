/**
 * StaticController - Serves the browser front end.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { readFile, stat } from 'fs/promises';
import { extname, resolve, sep } from 'path';
import { RouteParams } from '../routing/Router.js';
import { ApiError } from '../../shared/errors/ApiError.js';
import { sendApiError } from '../../shared/errors/ErrorNormalizer.js';

export const STATIC_PREFIX = '/static';
export const INDEX_PAGE = `${STATIC_PREFIX}/index.html`;

const CONTENT_TYPES: Record<string, string> = {
    '.html': 'text/html; charset=utf-8',
    '.js': 'text/javascript; charset=utf-8',
    '.css': 'text/css; charset=utf-8',
    '.json': 'application/json',
    '.svg': 'image/svg+xml',
    '.png': 'image/png',
    '.ico': 'image/x-icon',
};

export class StaticController {
    private readonly root: string;

    constructor(staticDir: string) {
        this.root = resolve(staticDir);
    }

    /**
     * GET / redirects to the front end.
     */
    async redirectToIndex(_req: IncomingMessage, res: ServerResponse): Promise<void> {
        res.writeHead(307, { Location: INDEX_PAGE });
        res.end();
    }

    /**
     * GET /static/*path
     */
    async serve(_req: IncomingMessage, res: ServerResponse, { params }: RouteParams): Promise<void> {
        const filePath = this.resolveInsideRoot(params.path);
        if (!filePath || !(await this.isFile(filePath))) {
            sendApiError(res, ApiError.routeNotFound());
            return;
        }

        const content = await readFile(filePath);
        res.writeHead(200, {
            'Content-Type': CONTENT_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream',
            'Content-Length': content.length,
        });
        res.end(content);
    }

    /**
     * Resolve a request path against the static root; null if it escapes it.
     */
    resolveInsideRoot(requestPath: string): string | null {
        const filePath = resolve(this.root, `.${sep}${requestPath}`);
        return filePath.startsWith(this.root + sep) ? filePath : null;
    }

    private async isFile(filePath: string): Promise<boolean> {
        try {
            return (await stat(filePath)).isFile();
        } catch (error) {
            if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
                return false;
            }
            throw error;
        }
    }
}
