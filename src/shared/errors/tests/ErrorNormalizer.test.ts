import { describe, it, expect } from 'vitest';
import { ApiError } from '../ApiError.js';
import { isExpectedError, normalizeError } from '../ErrorNormalizer.js';
import { ValidationError } from '../../validation/ValidationError.js';
import {
    ActivityNotFoundError,
    AlreadyRegisteredError,
    ParticipantNotFoundError,
} from '../../../domain/errors/RegistrationErrors.js';

describe('normalizeError', () => {
    it('should map a missing activity to 404', () => {
        const error = normalizeError(new ActivityNotFoundError('Go Club'));

        expect(error.statusCode).toBe(404);
        expect(error.toResponse()).toEqual({ detail: 'Activity not found' });
    });

    it('should map a missing participant to 404', () => {
        const error = normalizeError(new ParticipantNotFoundError('Chess Club', 'zoe@school.edu'));

        expect(error.statusCode).toBe(404);
        expect(error.toResponse()).toEqual({ detail: 'Participant not found in this activity' });
    });

    it('should map a duplicate signup to 400', () => {
        const error = normalizeError(new AlreadyRegisteredError('Chess Club', 'ana@school.edu'));

        expect(error.statusCode).toBe(400);
        expect(error.toResponse()).toEqual({ detail: 'Student is already signed up for this activity' });
    });

    it('should pass ApiErrors through', () => {
        const original = ApiError.routeNotFound();
        expect(normalizeError(original)).toBe(original);
    });

    it('should render validation errors with field details', () => {
        const error = normalizeError(ValidationError.forField('email', 'email is required'));

        expect(error.statusCode).toBe(422);
        expect(error.toResponse()).toEqual({
            detail: [{ field: 'email', message: 'email is required' }],
        });
    });

    it('should hide unexpected errors behind a 500', () => {
        const error = normalizeError(new Error('database exploded'));

        expect(error.statusCode).toBe(500);
        expect(error.toResponse()).toEqual({ detail: 'Internal server error' });
    });
});

describe('isExpectedError', () => {
    it('should distinguish client errors from bugs', () => {
        expect(isExpectedError(new ActivityNotFoundError('Go Club'))).toBe(true);
        expect(isExpectedError(ApiError.internal())).toBe(true);
        expect(isExpectedError(new RangeError('bug'))).toBe(false);
        expect(isExpectedError('string')).toBe(false);
    });
});
