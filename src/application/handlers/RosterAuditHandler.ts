import { IEventHandler } from '../ports/IEventDispatcher.js';
import { ParticipantSignedUp } from '../../domain/events/ParticipantSignedUp.js';
import { ParticipantUnregistered } from '../../domain/events/ParticipantUnregistered.js';
import { ILogger } from '../../infrastructure/observability/Logger.js';

export type RosterEvent = ParticipantSignedUp | ParticipantUnregistered;

/**
 * Writes one log line per roster change.
 */
export class RosterAuditHandler implements IEventHandler<RosterEvent> {
    private readonly logger: ILogger;

    constructor(logger: ILogger) {
        this.logger = logger.child({ component: 'RosterAuditHandler' });
    }

    async handle(event: RosterEvent): Promise<void> {
        const action = event.eventName === 'ParticipantSignedUp' ? 'signup' : 'unregister';

        this.logger.info(`Roster ${action}`, {
            action,
            activityName: event.activityName,
            email: event.email,
            occurredAt: event.dateTimeOccurred.toISOString(),
        });
    }
}
