/**
 * ValidationSchema - Declarative rules for untyped input.
 *
 * A schema maps field names to rules. Rules are discriminated by `type`;
 * `message` replaces every generated message for that field.
 */

interface BaseRule {
    required?: boolean;
    message?: string;
}

export interface StringRule extends BaseRule {
    type: 'string';
    /** Length bounds */
    min?: number;
    max?: number;
    pattern?: RegExp;
    enum?: readonly string[];
}

export interface IntegerRule extends BaseRule {
    type: 'integer';
    min?: number;
    max?: number;
}

export interface ArrayRule extends BaseRule {
    type: 'array';
    items?: FieldRule;
    /** Item count bounds */
    min?: number;
    max?: number;
    /** Reject repeated items */
    unique?: boolean;
}

export type FieldRule = StringRule | IntegerRule | ArrayRule;

export type ValidationSchema = Record<string, FieldRule>;

export interface SchemaOptions {
    /** Report fields the schema does not name (default: false) */
    rejectUnknown?: boolean;
    /** Prefix for reported field names, e.g. the record's key */
    path?: string;
}

export interface ValidationFieldError {
    field: string;
    message: string;
    value?: unknown;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationFieldError[];
}

export function stringField(options: Omit<StringRule, 'type'> = {}): StringRule {
    return { type: 'string', ...options };
}

export function integerField(options: Omit<IntegerRule, 'type'> = {}): IntegerRule {
    return { type: 'integer', ...options };
}

export function arrayField(items: FieldRule, options: Omit<ArrayRule, 'type' | 'items'> = {}): ArrayRule {
    return { type: 'array', items, ...options };
}
