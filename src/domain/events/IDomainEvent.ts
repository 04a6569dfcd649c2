export interface IDomainEvent {
    /** Subscription key; stable across builds, unlike the class name */
    readonly eventName: string;
    dateTimeOccurred: Date;
    getAggregateId(): string;
}
