/**
 * Errors raised by the activity registry. Each is an expected,
 * request-scoped outcome of a roster change.
 */

export type RegistrationErrorCode =
    | 'ACTIVITY_NOT_FOUND'
    | 'PARTICIPANT_NOT_FOUND'
    | 'ALREADY_REGISTERED';

export abstract class RegistrationError extends Error {
    abstract readonly code: RegistrationErrorCode;

    constructor(
        message: string,
        readonly activityName: string
    ) {
        super(message);
        this.name = new.target.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class ActivityNotFoundError extends RegistrationError {
    readonly code = 'ACTIVITY_NOT_FOUND';

    constructor(activityName: string) {
        super(`Activity ${activityName} not found`, activityName);
    }
}

export class ParticipantNotFoundError extends RegistrationError {
    readonly code = 'PARTICIPANT_NOT_FOUND';

    constructor(activityName: string, readonly email: string) {
        super(`${email} is not registered for ${activityName}`, activityName);
    }
}

export class AlreadyRegisteredError extends RegistrationError {
    readonly code = 'ALREADY_REGISTERED';

    constructor(activityName: string, readonly email: string) {
        super(`${email} is already registered for ${activityName}`, activityName);
    }
}
