/**
 * RequestContext - Request-scoped data carried across awaits.
 *
 * Backed by AsyncLocalStorage; anything logged while a request is being
 * handled can read its correlation id and route from here.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { performance } from 'perf_hooks';

export interface RequestScope {
    correlationId: string;
    requestId: string;
    method: string;
    route: string;
    /** performance.now() when the request arrived */
    startedAt: number;
}

const storage = new AsyncLocalStorage<RequestScope>();

export class RequestContext {
    static run<T>(scope: RequestScope, fn: () => Promise<T>): Promise<T> {
        return storage.run(scope, fn);
    }

    static current(): RequestScope | undefined {
        return storage.getStore();
    }

    /**
     * Milliseconds since the current request arrived, 0 outside a request.
     */
    static elapsedMs(): number {
        const scope = storage.getStore();
        return scope ? Math.round(performance.now() - scope.startedAt) : 0;
    }
}
