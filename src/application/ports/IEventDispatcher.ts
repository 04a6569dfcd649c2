import { IDomainEvent } from '../../domain/events/IDomainEvent.js';

export interface IEventHandler<T extends IDomainEvent> {
    handle(event: T): Promise<void>;
}

export type Unsubscribe = () => void;

export interface IEventDispatcher {
    /**
     * Run every handler subscribed to `event.eventName`, in subscription
     * order. A failing handler rejects the dispatch.
     */
    dispatch(event: IDomainEvent): Promise<void>;
    subscribe<T extends IDomainEvent>(eventName: T['eventName'], handler: IEventHandler<T>): Unsubscribe;
    getSubscriberCount(eventName?: string): number;
}
