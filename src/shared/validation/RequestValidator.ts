/**
 * RequestValidator - Checks untyped input against a ValidationSchema.
 *
 * Used for query strings, seed records and environment variables.
 * Every problem is collected; nothing stops at the first one.
 */

import {
    ArrayRule,
    FieldRule,
    IntegerRule,
    SchemaOptions,
    StringRule,
    ValidationFieldError,
    ValidationResult,
    ValidationSchema,
} from './ValidationSchema.js';
import { ValidationError } from './ValidationError.js';

const EXPECTED: Record<FieldRule['type'], string> = {
    string: 'a string',
    integer: 'an integer',
    array: 'an array',
};

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
    return Array.isArray(value) ? 'array' : typeof value;
}

function isMissing(value: unknown): boolean {
    return value === undefined || value === null;
}

function checkString(field: string, value: string, rule: StringRule): string[] {
    const problems: string[] = [];

    if (rule.min !== undefined && value.length < rule.min) {
        problems.push(`${field} must be at least ${rule.min} characters`);
    }
    if (rule.max !== undefined && value.length > rule.max) {
        problems.push(`${field} must be at most ${rule.max} characters`);
    }
    if (rule.pattern && !rule.pattern.test(value)) {
        problems.push(`${field} has invalid format`);
    }
    if (rule.enum && !rule.enum.includes(value)) {
        problems.push(`${field} must be one of [${rule.enum.join(', ')}]`);
    }

    return problems;
}

function checkInteger(field: string, value: number, rule: IntegerRule): string[] {
    if (!Number.isInteger(value)) {
        return [`${field} must be an integer`];
    }

    const problems: string[] = [];
    if (rule.min !== undefined && value < rule.min) {
        problems.push(`${field} must be at least ${rule.min}`);
    }
    if (rule.max !== undefined && value > rule.max) {
        problems.push(`${field} must be at most ${rule.max}`);
    }
    return problems;
}

function checkArrayShape(field: string, value: unknown[], rule: ArrayRule): string[] {
    const problems: string[] = [];

    if (rule.min !== undefined && value.length < rule.min) {
        problems.push(`${field} must have at least ${rule.min} items`);
    }
    if (rule.max !== undefined && value.length > rule.max) {
        problems.push(`${field} must have at most ${rule.max} items`);
    }
    if (rule.unique) {
        const seen = new Set<unknown>();
        for (const item of value) {
            if (seen.has(item)) {
                problems.push(`${field} contains a duplicate entry: ${String(item)}`);
            }
            seen.add(item);
        }
    }

    return problems;
}

/**
 * Problems with one value, including those of array items.
 */
function checkField(field: string, value: unknown, rule: FieldRule): ValidationFieldError[] {
    const report = (messages: string[]): ValidationFieldError[] =>
        messages.map(message => ({ field, message: rule.message ?? message, value }));

    if (isMissing(value) || (rule.required && value === '')) {
        return rule.required ? report([`${field} is required`]) : [];
    }

    if (rule.type === 'string') {
        return typeof value === 'string'
            ? report(checkString(field, value, rule))
            : report([`${field} must be ${EXPECTED.string}, got ${describeType(value)}`]);
    }

    if (rule.type === 'integer') {
        return typeof value === 'number'
            ? report(checkInteger(field, value, rule))
            : report([`${field} must be ${EXPECTED.integer}, got ${describeType(value)}`]);
    }

    if (!Array.isArray(value)) {
        return report([`${field} must be ${EXPECTED.array}, got ${describeType(value)}`]);
    }

    const { items } = rule;
    const itemErrors = items
        ? value.flatMap((item, i) => checkField(`${field}[${i}]`, item, items))
        : [];
    return [...itemErrors, ...report(checkArrayShape(field, value, rule))];
}

export function validate(
    data: unknown,
    schema: ValidationSchema,
    options: SchemaOptions = {}
): ValidationResult {
    const { rejectUnknown = false, path } = options;
    const qualify = (field: string): string => (path ? `${path}.${field}` : field);

    if (!isRecord(data)) {
        return {
            valid: false,
            errors: [{ field: path ?? '$root', message: `${path ?? 'value'} must be an object`, value: data }],
        };
    }

    const errors: ValidationFieldError[] = [];

    if (rejectUnknown) {
        for (const key of Object.keys(data)) {
            if (!Object.hasOwn(schema, key)) {
                errors.push({ field: qualify(key), message: `Unknown field: ${qualify(key)}` });
            }
        }
    }

    for (const [key, rule] of Object.entries(schema)) {
        errors.push(...checkField(qualify(key), data[key], rule));
    }

    return { valid: errors.length === 0, errors };
}

/**
 * Validate, throwing a ValidationError that lists every problem.
 */
export function validateOrThrow(
    data: unknown,
    schema: ValidationSchema,
    options: SchemaOptions = {}
): void {
    const result = validate(data, schema, options);
    if (!result.valid) {
        throw ValidationError.fromFieldErrors(result.errors);
    }
}
