/**
 * Router - Method + path template dispatch.
 *
 * Templates are matched segment by segment against the request path:
 * `:name` captures one segment, a trailing `*name` captures everything
 * after it. Captures are percent-decoded; the query string is parsed
 * with form rules (`+` is a space).
 */

import { IncomingMessage, ServerResponse } from 'http';
import { URLSearchParams } from 'url';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface RouteParams {
    params: Record<string, string>;
    query: Record<string, string>;
}

export type RouteHandler = (
    req: IncomingMessage,
    res: ServerResponse,
    params: RouteParams
) => Promise<void>;

interface CompiledRoute {
    method: HttpMethod;
    matcher: RegExp;
    keys: string[];
    handler: RouteHandler;
}

const PARAM_SEGMENT = /^([:*])([A-Za-z_]\w*)$/;

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Percent-decode, keeping the raw text when the escape is malformed.
 */
function decodeSegment(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        return value;
    }
}

function compileTemplate(template: string): { matcher: RegExp; keys: string[] } {
    const keys: string[] = [];
    const segments = template.split('/');

    const source = segments.map((segment, index) => {
        const param = PARAM_SEGMENT.exec(segment);
        if (!param) {
            return escapeRegExp(segment);
        }

        const [, kind, key] = param;
        if (kind === '*' && index !== segments.length - 1) {
            throw new Error(`Wildcard *${key} must be the last segment of ${template}`);
        }
        keys.push(key);
        return kind === '*' ? '(.+)' : '([^/]+)';
    });

    return { matcher: new RegExp(`^${source.join('/')}$`), keys };
}

export function parseQueryString(search: string): Record<string, string> {
    return Object.fromEntries(new URLSearchParams(search));
}

export class Router {
    private readonly routes: CompiledRoute[] = [];

    constructor(private readonly prefix: string = '') { }

    get(template: string, handler: RouteHandler): this {
        return this.register('GET', template, handler);
    }

    post(template: string, handler: RouteHandler): this {
        return this.register('POST', template, handler);
    }

    delete(template: string, handler: RouteHandler): this {
        return this.register('DELETE', template, handler);
    }

    private register(method: HttpMethod, template: string, handler: RouteHandler): this {
        this.routes.push({ method, handler, ...compileTemplate(this.prefix + template) });
        return this;
    }

    /**
     * Run the first route matching the request.
     * Resolves false when none matched; nothing has been written then.
     */
    async handle(req: IncomingMessage, res: ServerResponse): Promise<boolean> {
        const url = req.url ?? '/';
        const queryStart = url.indexOf('?');
        const path = queryStart === -1 ? url : url.slice(0, queryStart);
        const search = queryStart === -1 ? '' : url.slice(queryStart + 1);

        for (const route of this.routes) {
            if (route.method !== req.method) {
                continue;
            }

            const match = route.matcher.exec(path);
            if (!match) {
                continue;
            }

            const params: Record<string, string> = {};
            route.keys.forEach((key, i) => {
                params[key] = decodeSegment(match[i + 1]);
            });

            await route.handler(req, res, { params, query: parseQueryString(search) });
            return true;
        }

        return false;
    }
}
