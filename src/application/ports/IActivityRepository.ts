import { ActivityCatalog, IActivity, IRegistrationResult } from '../../domain/entities/Activity.js';

/**
 * The activity registry.
 *
 * Roster mutations reject with ActivityNotFoundError, AlreadyRegisteredError
 * or ParticipantNotFoundError. Implementations must make each
 * check-then-mutate atomic with respect to other calls.
 */
export interface IActivityRepository {
    /** All activities keyed by name. Returned records are copies. */
    findAll(): Promise<ActivityCatalog>;
    findByName(name: string): Promise<IActivity | null>;
    count(): Promise<number>;
    addParticipant(activityName: string, email: string): Promise<IRegistrationResult>;
    removeParticipant(activityName: string, email: string): Promise<IRegistrationResult>;
}
