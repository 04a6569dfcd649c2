import { IDomainEvent } from './IDomainEvent.js';

/**
 * A participant was added to or removed from an activity's roster.
 */
export abstract class RosterChanged implements IDomainEvent {
    abstract readonly eventName: string;
    public dateTimeOccurred: Date;

    constructor(
        public readonly activityName: string,
        public readonly email: string
    ) {
        this.dateTimeOccurred = new Date();
    }

    getAggregateId(): string {
        return this.activityName;
    }
}
