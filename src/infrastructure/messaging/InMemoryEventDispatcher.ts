import { IDomainEvent } from '../../domain/events/IDomainEvent.js';
import { IEventDispatcher, IEventHandler, Unsubscribe } from '../../application/ports/IEventDispatcher.js';

export class InMemoryEventDispatcher implements IEventDispatcher {
    private readonly handlers = new Map<string, IEventHandler<IDomainEvent>[]>();

    async dispatch(event: IDomainEvent): Promise<void> {
        // Copy so a handler that unsubscribes does not skip its neighbour
        const subscribed = [...(this.handlers.get(event.eventName) ?? [])];

        for (const handler of subscribed) {
            await handler.handle(event);
        }
    }

    subscribe<T extends IDomainEvent>(eventName: T['eventName'], handler: IEventHandler<T>): Unsubscribe {
        const subscribed = this.handlers.get(eventName) ?? [];
        subscribed.push(handler);
        this.handlers.set(eventName, subscribed);

        return () => {
            const index = subscribed.indexOf(handler);
            if (index !== -1) {
                subscribed.splice(index, 1);
            }
        };
    }

    getSubscriberCount(eventName?: string): number {
        if (eventName !== undefined) {
            return this.handlers.get(eventName)?.length ?? 0;
        }
        let count = 0;
        for (const subscribed of this.handlers.values()) {
            count += subscribed.length;
        }
        return count;
    }
}
