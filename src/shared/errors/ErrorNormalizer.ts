/**
 * ErrorNormalizer - Convert any error to normalized format.
 *
 * Ensures consistent error responses across the entire API.
 */

import { ServerResponse } from 'http';
import { ApiError } from './ApiError.js';
import { RegistrationError } from '../../domain/errors/RegistrationErrors.js';

/**
 * Map a registry error onto its public status and message.
 */
function fromRegistrationError(error: RegistrationError): ApiError {
    switch (error.code) {
        case 'ACTIVITY_NOT_FOUND':
            return ApiError.notFound('Activity');
        case 'PARTICIPANT_NOT_FOUND':
            return ApiError.notFound('Participant', 'this activity');
        case 'ALREADY_REGISTERED':
            return ApiError.alreadyRegistered();
    }
}

/**
 * Normalize any error to an ApiError.
 */
export function normalizeError(error: unknown): ApiError {
    // Already an ApiError
    if (error instanceof ApiError) {
        return error;
    }

    if (error instanceof RegistrationError) {
        return fromRegistrationError(error);
    }

    // Anything else is a bug; the original message stays in the logs
    return ApiError.internal();
}

/**
 * Whether an error is one of the expected, client-facing kinds.
 */
export function isExpectedError(error: unknown): boolean {
    return error instanceof ApiError || error instanceof RegistrationError;
}

/**
 * Send a normalized error response.
 */
export function sendErrorResponse(res: ServerResponse, error: unknown): void {
    sendApiError(res, normalizeError(error));
}

/**
 * Send an ApiError directly.
 */
export function sendApiError(res: ServerResponse, error: ApiError): void {
    res.writeHead(error.statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(error.toResponse()));
}

/**
 * Send a JSON body with the given status.
 */
export function sendJson<T>(res: ServerResponse, data: T, statusCode = 200): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
}
