/**
 * An extracurricular activity. Its name is the key it is stored under,
 * so the record itself carries only the mutable roster and display data.
 * Field names match the JSON the API exposes.
 */
export interface IActivity {
    description: string;
    schedule: string;
    /** Advisory capacity; signups are not rejected once it is reached. */
    max_participants: number;
    /** Registered emails in signup order, each at most once. */
    participants: string[];
}

/**
 * Activities keyed by name, in registry order.
 */
export type ActivityCatalog = Record<string, IActivity>;

/**
 * Outcome of a successful roster change.
 */
export interface IRegistrationResult {
    activityName: string;
    email: string;
}

export function copyActivity(activity: IActivity): IActivity {
    return { ...activity, participants: [...activity.participants] };
}

/**
 * Seats left before the advisory capacity is reached. Negative once the
 * roster has grown past it.
 */
export function remainingSpots(activity: IActivity): number {
    return activity.max_participants - activity.participants.length;
}
