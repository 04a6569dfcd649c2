/**
 * ActivitySchemas - Schemas for roster requests and seed records.
 */

import { ValidationSchema, stringField, integerField, arrayField } from '../ValidationSchema.js';

/**
 * Maximum length of an email address (RFC 5321 path limit). Applied to
 * seed rosters only; requests accept any non-empty email.
 */
export const MAX_EMAIL_LENGTH = 254;

/**
 * Query string of the signup and unregister routes.
 * The email format itself is not checked.
 */
export const registrationQuerySchema: ValidationSchema = {
    email: stringField({ required: true }),
};

/**
 * One activity record in the seed file.
 */
export const activitySeedSchema: ValidationSchema = {
    description: stringField({ required: true }),
    schedule: stringField({ required: true }),
    max_participants: integerField({ required: true, min: 0 }),
    participants: arrayField(
        stringField({ required: true, min: 1, max: MAX_EMAIL_LENGTH }),
        { required: true, unique: true }
    ),
};
