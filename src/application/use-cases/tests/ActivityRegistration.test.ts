import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ListActivities } from '../implementation/ListActivities.js';
import { SignUpForActivity } from '../implementation/SignUpForActivity.js';
import { UnregisterFromActivity } from '../implementation/UnregisterFromActivity.js';
import { InMemoryActivityRepository } from '../../../infrastructure/persistence/in-memory/InMemoryActivityRepository.js';
import { InMemoryEventDispatcher } from '../../../infrastructure/messaging/InMemoryEventDispatcher.js';
import { ParticipantSignedUp } from '../../../domain/events/ParticipantSignedUp.js';
import { ParticipantUnregistered } from '../../../domain/events/ParticipantUnregistered.js';
import type { IDomainEvent } from '../../../domain/events/IDomainEvent.js';
import type { IEventHandler } from '../../ports/IEventDispatcher.js';
import { RosterAuditHandler } from '../../handlers/RosterAuditHandler.js';
import type { ILogger } from '../../../infrastructure/observability/Logger.js';
import { ActivityNotFoundError, ParticipantNotFoundError } from '../../../domain/errors/RegistrationErrors.js';

describe('Activity registration use cases', () => {
    let repository: InMemoryActivityRepository;
    let dispatcher: InMemoryEventDispatcher;
    let events: IDomainEvent[];

    beforeEach(() => {
        repository = new InMemoryActivityRepository({
            'Chess Club': {
                description: 'Strategy games',
                schedule: 'Fridays',
                max_participants: 12,
                participants: ['ana@school.edu'],
            },
        });
        dispatcher = new InMemoryEventDispatcher();
        events = [];

        const recorder: IEventHandler<IDomainEvent> = {
            handle: async (event) => {
                events.push(event);
            },
        };
        dispatcher.subscribe('ParticipantSignedUp', recorder);
        dispatcher.subscribe('ParticipantUnregistered', recorder);
    });

    it('should list the catalog', async () => {
        const catalog = await new ListActivities(repository).execute();

        expect(Object.keys(catalog)).toEqual(['Chess Club']);
        expect(catalog['Chess Club'].participants).toEqual(['ana@school.edu']);
    });

    it('should sign up and emit ParticipantSignedUp', async () => {
        const useCase = new SignUpForActivity(repository, dispatcher);

        const result = await useCase.execute({ activityName: 'Chess Club', email: 'ben@school.edu' });

        expect(result).toEqual({ activityName: 'Chess Club', email: 'ben@school.edu' });
        expect(events).toHaveLength(1);
        const [event] = events;
        expect(event).toBeInstanceOf(ParticipantSignedUp);
        expect(event.getAggregateId()).toBe('Chess Club');
    });

    it('should not emit an event when signup fails', async () => {
        const useCase = new SignUpForActivity(repository, dispatcher);

        await expect(useCase.execute({ activityName: 'Go Club', email: 'ben@school.edu' }))
            .rejects.toBeInstanceOf(ActivityNotFoundError);
        expect(events).toEqual([]);
    });

    it('should unregister and emit ParticipantUnregistered', async () => {
        const useCase = new UnregisterFromActivity(repository, dispatcher);

        await useCase.execute({ activityName: 'Chess Club', email: 'ana@school.edu' });

        expect(events).toHaveLength(1);
        expect(events[0]).toBeInstanceOf(ParticipantUnregistered);
        expect((await repository.findByName('Chess Club'))?.participants).toEqual([]);
    });

    it('should not emit an event when the participant is missing', async () => {
        const useCase = new UnregisterFromActivity(repository, dispatcher);

        await expect(useCase.execute({ activityName: 'Chess Club', email: 'zoe@school.edu' }))
            .rejects.toBeInstanceOf(ParticipantNotFoundError);
        expect(events).toEqual([]);
    });
});

describe('RosterAuditHandler', () => {
    function mockLogger() {
        const info = vi.fn();
        const child = vi.fn();
        const logger: ILogger = { debug: vi.fn(), info, warn: vi.fn(), error: vi.fn(), child };
        child.mockReturnValue(logger);
        return { logger, info, child };
    }

    it('should log signups', async () => {
        const { logger, info, child } = mockLogger();
        const handler = new RosterAuditHandler(logger);
        const event = new ParticipantSignedUp('Chess Club', 'ben@school.edu');

        await handler.handle(event);

        expect(child).toHaveBeenCalledWith({ component: 'RosterAuditHandler' });
        expect(info).toHaveBeenCalledWith('Roster signup', {
            action: 'signup',
            activityName: 'Chess Club',
            email: 'ben@school.edu',
            occurredAt: event.dateTimeOccurred.toISOString(),
        });
    });

    it('should log removals', async () => {
        const { logger, info } = mockLogger();
        const handler = new RosterAuditHandler(logger);

        await handler.handle(new ParticipantUnregistered('Chess Club', 'ana@school.edu'));

        expect(info).toHaveBeenCalledWith('Roster unregister', expect.objectContaining({
            action: 'unregister',
            email: 'ana@school.edu',
        }));
    });
});
