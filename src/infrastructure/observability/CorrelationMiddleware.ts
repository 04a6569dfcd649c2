/**
 * CorrelationMiddleware - Opens the request scope and tags the response.
 *
 * A caller-supplied X-Correlation-Id is reused so one id follows a
 * request across services; X-Request-Id is always fresh.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { performance } from 'perf_hooks';
import { RequestContext, RequestScope } from './RequestContext.js';
import { IdGenerator } from '../../shared/utils/IdGenerator.js';

export const CORRELATION_ID_HEADER = 'x-correlation-id';
export const REQUEST_ID_HEADER = 'x-request-id';

const MAX_CORRELATION_ID_LENGTH = 128;

function incomingCorrelationId(req: IncomingMessage): string | undefined {
    const raw = req.headers[CORRELATION_ID_HEADER];
    const value = (Array.isArray(raw) ? raw[0] : raw)?.trim();
    return value && value.length <= MAX_CORRELATION_ID_LENGTH ? value : undefined;
}

/**
 * Request path without its query string.
 */
export function routeOf(url: string | undefined): string {
    if (!url) return '/';
    const queryStart = url.indexOf('?');
    return queryStart === -1 ? url : url.slice(0, queryStart);
}

export function createRequestScope(req: IncomingMessage): RequestScope {
    return {
        correlationId: incomingCorrelationId(req) ?? IdGenerator.generate(),
        requestId: IdGenerator.generate(),
        method: req.method ?? 'GET',
        route: routeOf(req.url),
        startedAt: performance.now(),
    };
}

/**
 * Run `handler` inside a new request scope. Headers are set up front so
 * every response path carries them.
 */
export function withCorrelation<T>(
    req: IncomingMessage,
    res: ServerResponse,
    handler: (scope: RequestScope) => Promise<T>
): Promise<T> {
    const scope = createRequestScope(req);

    res.setHeader(CORRELATION_ID_HEADER, scope.correlationId);
    res.setHeader(REQUEST_ID_HEADER, scope.requestId);

    return RequestContext.run(scope, () => handler(scope));
}
