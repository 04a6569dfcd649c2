/**
 * ActivitySeedLoader - Reads the initial activity catalog from JSON.
 *
 * The file maps activity name to
 * `{ description, schedule, max_participants, participants }`.
 * Any invalid record fails the whole load; the service must not start
 * with a partial catalog.
 */

import { readFile } from 'fs/promises';
import { ActivityCatalog, IActivity } from '../../../domain/entities/Activity.js';
import {
    ValidationError,
    ValidationFieldError,
    activitySeedSchema,
    isRecord,
    validate,
} from '../../../shared/validation/index.js';

/**
 * Validate parsed seed JSON and build the catalog from it.
 */
export function parseActivitySeed(raw: unknown): ActivityCatalog {
    if (!isRecord(raw)) {
        throw new ValidationError('Activity seed must be an object keyed by activity name', [
            { field: '$root', message: 'Activity seed must be an object keyed by activity name' },
        ]);
    }

    const errors: ValidationFieldError[] = [];
    const entries: [string, IActivity][] = [];

    for (const [name, record] of Object.entries(raw)) {
        const result = validate(record, activitySeedSchema, { rejectUnknown: true, path: name });
        if (!result.valid) {
            errors.push(...result.errors);
            continue;
        }

        const activity = toActivity(record);
        if (activity) {
            entries.push([name, activity]);
        }
    }

    if (errors.length > 0) {
        throw ValidationError.fromFieldErrors(errors);
    }

    return Object.fromEntries(entries);
}

/**
 * Read and parse a seed file.
 */
export async function loadActivitySeed(filePath: string): Promise<ActivityCatalog> {
    const content = await readFile(filePath, 'utf8');

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ValidationError(`Activity seed ${filePath} is not valid JSON: ${reason}`);
    }

    return parseActivitySeed(raw);
}

/**
 * Copy the fields of a record that already passed activitySeedSchema.
 */
function toActivity(record: unknown): IActivity | null {
    if (!isRecord(record)) {
        return null;
    }

    const { description, schedule, max_participants, participants } = record;
    if (
        typeof description !== 'string' ||
        typeof schedule !== 'string' ||
        typeof max_participants !== 'number' ||
        !Array.isArray(participants)
    ) {
        return null;
    }

    return {
        description,
        schedule,
        max_participants,
        participants: participants.filter((email): email is string => typeof email === 'string'),
    };
}
