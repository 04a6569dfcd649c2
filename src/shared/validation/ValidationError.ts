/**
 * ValidationError - An ApiError carrying per-field problems.
 *
 * Responds 422 with `detail` set to the field list.
 */

import { ApiError } from '../errors/ApiError.js';
import { ValidationFieldError } from './ValidationSchema.js';

export class ValidationError extends ApiError {
    constructor(message: string, readonly fieldErrors: ValidationFieldError[] = []) {
        super('VALIDATION_ERROR', message, fieldErrors.map(({ field, message: text }) => ({ field, message: text })));
        this.name = 'ValidationError';
        Object.setPrototypeOf(this, ValidationError.prototype);
    }

    static forField(field: string, message: string, value?: unknown): ValidationError {
        return new ValidationError(message, [{ field, message, value }]);
    }

    /**
     * A single problem becomes the message as-is; several are joined.
     */
    static fromFieldErrors(fieldErrors: ValidationFieldError[]): ValidationError {
        if (fieldErrors.length === 1) {
            return new ValidationError(fieldErrors[0].message, fieldErrors);
        }
        const summary = fieldErrors.map(e => e.message).join('; ');
        return new ValidationError(summary ? `Validation failed: ${summary}` : 'Validation failed', fieldErrors);
    }
}
