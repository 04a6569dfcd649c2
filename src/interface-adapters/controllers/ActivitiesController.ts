/**
 * ActivitiesController - Activity listing and roster changes.
 *
 * Registry and validation errors propagate to AppRouter, which renders
 * them as `{ "detail": ... }` through the error normalizer.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { RouteParams } from '../routing/Router.js';
import { ListActivities } from '../../application/use-cases/implementation/ListActivities.js';
import { SignUpForActivity } from '../../application/use-cases/implementation/SignUpForActivity.js';
import { UnregisterFromActivity } from '../../application/use-cases/implementation/UnregisterFromActivity.js';
import { sendJson } from '../../shared/errors/ErrorNormalizer.js';
import { registrationQuerySchema, validateOrThrow } from '../../shared/validation/index.js';

/**
 * Body of a successful roster change.
 */
export interface RegistrationMessage {
    message: string;
}

export class ActivitiesController {
    constructor(
        private readonly listActivitiesUseCase: ListActivities,
        private readonly signUpUseCase: SignUpForActivity,
        private readonly unregisterUseCase: UnregisterFromActivity
    ) {}

    /**
     * GET /activities
     */
    async list(_req: IncomingMessage, res: ServerResponse): Promise<void> {
        const activities = await this.listActivitiesUseCase.execute();
        sendJson(res, activities);
    }

    /**
     * POST /activities/:activityName/signup?email=
     */
    async signUp(_req: IncomingMessage, res: ServerResponse, { params, query }: RouteParams): Promise<void> {
        validateOrThrow(query, registrationQuerySchema);

        const result = await this.signUpUseCase.execute({
            activityName: params.activityName,
            email: query.email,
        });

        sendJson<RegistrationMessage>(res, {
            message: `Signed up ${result.email} for ${result.activityName}`,
        });
    }

    /**
     * DELETE /activities/:activityName/unregister?email=
     */
    async unregister(_req: IncomingMessage, res: ServerResponse, { params, query }: RouteParams): Promise<void> {
        validateOrThrow(query, registrationQuerySchema);

        const result = await this.unregisterUseCase.execute({
            activityName: params.activityName,
            email: query.email,
        });

        sendJson<RegistrationMessage>(res, {
            message: `${result.email} unregistered from ${result.activityName}`,
        });
    }
}
