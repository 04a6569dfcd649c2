/**
 * ErrorCodes - Every code the API reports, with its HTTP status.
 */

export const ERROR_CODE_TO_STATUS = {
    VALIDATION_ERROR: 422,
    NOT_FOUND: 404,
    ALREADY_REGISTERED: 400,
    INTERNAL_ERROR: 500,
} as const satisfies Record<string, number>;

export type ErrorCode = keyof typeof ERROR_CODE_TO_STATUS;
