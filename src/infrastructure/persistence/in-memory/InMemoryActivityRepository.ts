import { IActivityRepository } from '../../../application/ports/IActivityRepository.js';
import {
    ActivityCatalog,
    IActivity,
    IRegistrationResult,
    copyActivity,
} from '../../../domain/entities/Activity.js';
import {
    ActivityNotFoundError,
    AlreadyRegisteredError,
    ParticipantNotFoundError,
} from '../../../domain/errors/RegistrationErrors.js';

/**
 * Process-local activity registry.
 *
 * Each roster change checks and mutates in one synchronous step, so no
 * other request can interleave on the event loop between the two.
 */
export class InMemoryActivityRepository implements IActivityRepository {
    private activities: Map<string, IActivity> = new Map();

    constructor(seed: ActivityCatalog = {}) {
        this.reset(seed);
    }

    /**
     * Replace every activity with a copy of the given catalog.
     */
    reset(seed: ActivityCatalog): void {
        this.activities = new Map(
            Object.entries(seed).map(([name, activity]) => [name, copyActivity(activity)])
        );
    }

    async findAll(): Promise<ActivityCatalog> {
        // fromEntries keeps a name like "__proto__" as an own key
        return Object.fromEntries(
            [...this.activities].map(([name, activity]) => [name, copyActivity(activity)])
        );
    }

    async findByName(name: string): Promise<IActivity | null> {
        const activity = this.activities.get(name);
        return activity ? copyActivity(activity) : null;
    }

    async count(): Promise<number> {
        return this.activities.size;
    }

    async addParticipant(activityName: string, email: string): Promise<IRegistrationResult> {
        const activity = this.activities.get(activityName);
        if (!activity) {
            throw new ActivityNotFoundError(activityName);
        }
        if (activity.participants.includes(email)) {
            throw new AlreadyRegisteredError(activityName, email);
        }

        activity.participants.push(email);
        return { activityName, email };
    }

    async removeParticipant(activityName: string, email: string): Promise<IRegistrationResult> {
        const activity = this.activities.get(activityName);
        if (!activity) {
            throw new ActivityNotFoundError(activityName);
        }

        const index = activity.participants.indexOf(email);
        if (index === -1) {
            throw new ParticipantNotFoundError(activityName, email);
        }

        activity.participants.splice(index, 1);
        return { activityName, email };
    }
}
