/**
 * AppRouter - Wires every endpoint and wraps each request with
 * correlation context, request logging and the 404/500 fallbacks.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { Router } from './Router.js';
import { ActivitiesController } from '../controllers/ActivitiesController.js';
import { HealthController } from '../controllers/HealthController.js';
import { StaticController, STATIC_PREFIX } from '../controllers/StaticController.js';
import { withCorrelation } from '../../infrastructure/observability/CorrelationMiddleware.js';
import { RequestContext } from '../../infrastructure/observability/RequestContext.js';
import { ILogger } from '../../infrastructure/observability/Logger.js';
import { ApiError } from '../../shared/errors/ApiError.js';
import { isExpectedError, sendApiError, sendErrorResponse, sendJson } from '../../shared/errors/ErrorNormalizer.js';

export interface AppRouterDependencies {
    activitiesController: ActivitiesController;
    healthController: HealthController;
    staticController: StaticController;
    logger: ILogger;
}

export class AppRouter {
    private router: Router;
    private logger: ILogger;

    constructor(private readonly dependencies: AppRouterDependencies) {
        this.router = new Router();
        this.logger = dependencies.logger.child({ component: 'AppRouter' });

        this.setupRoutes();
    }

    private setupRoutes(): void {
        const { activitiesController, healthController, staticController } = this.dependencies;

        this.router.get('/', (req, res) =>
            staticController.redirectToIndex(req, res)
        );
        this.router.get(`${STATIC_PREFIX}/*path`, (req, res, params) =>
            staticController.serve(req, res, params)
        );

        this.router.get('/health', async (_req, res) => {
            const result = await healthController.handle();
            sendJson(res, result.body, result.statusCode);
        });

        this.router.get('/activities', (req, res) =>
            activitiesController.list(req, res)
        );
        this.router.post('/activities/:activityName/signup', (req, res, params) =>
            activitiesController.signUp(req, res, params)
        );
        this.router.delete('/activities/:activityName/unregister', (req, res, params) =>
            activitiesController.unregister(req, res, params)
        );
    }

    /**
     * Handle a request end to end. Never rejects: failures become a 500.
     */
    async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
        await withCorrelation(req, res, async ({ method, route }) => {
            try {
                const handled = await this.router.handle(req, res);
                if (!handled) {
                    sendApiError(res, ApiError.routeNotFound());
                }
            } catch (error) {
                if (!isExpectedError(error)) {
                    this.logger.error(
                        'Unhandled request error',
                        error instanceof Error ? error : new Error(String(error))
                    );
                }
                if (!res.headersSent) {
                    sendErrorResponse(res, error);
                } else {
                    res.end();
                }
            }

            this.logger.info('Request completed', {
                method,
                route,
                statusCode: res.statusCode,
                latencyMs: RequestContext.elapsedMs(),
            });
        });
    }
}
