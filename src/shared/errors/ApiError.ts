/**
 * ApiError - Base error class for API responses.
 *
 * Renders as `{ "detail": ... }`: the message, or the per-field
 * errors when there are any.
 */

import { ErrorCode, ERROR_CODE_TO_STATUS } from './ErrorCodes.js';

/**
 * One field-level problem reported in an error body.
 */
export interface ApiErrorDetail {
    field: string;
    message: string;
}

/**
 * Normalized error response structure.
 */
export interface ApiErrorResponse {
    detail: string | ApiErrorDetail[];
}

/**
 * API error with standardized structure.
 */
export class ApiError extends Error {
    readonly code: ErrorCode;
    readonly statusCode: number;
    readonly details?: ApiErrorDetail[];

    constructor(code: ErrorCode, message: string, details?: ApiErrorDetail[]) {
        super(message);
        this.name = 'ApiError';
        this.code = code;
        this.statusCode = ERROR_CODE_TO_STATUS[code];
        this.details = details;

        // Ensure proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, ApiError.prototype);
    }

    /**
     * Convert to normalized response format.
     */
    toResponse(): ApiErrorResponse {
        if (this.details && this.details.length > 0) {
            return { detail: this.details };
        }
        return { detail: this.message };
    }

    /**
     * Create a not found error, e.g. `notFound('Participant', 'this activity')`
     * reads "Participant not found in this activity".
     */
    static notFound(resource: string, scope?: string): ApiError {
        const message = scope
            ? `${resource} not found in ${scope}`
            : `${resource} not found`;
        return new ApiError('NOT_FOUND', message);
    }

    /**
     * Create the error for an unmatched route.
     */
    static routeNotFound(): ApiError {
        return new ApiError('NOT_FOUND', 'Not Found');
    }

    /**
     * Create an already registered error.
     */
    static alreadyRegistered(message = 'Student is already signed up for this activity'): ApiError {
        return new ApiError('ALREADY_REGISTERED', message);
    }

    /**
     * Create an internal error.
     */
    static internal(message = 'Internal server error'): ApiError {
        return new ApiError('INTERNAL_ERROR', message);
    }
}
