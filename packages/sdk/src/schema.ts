import { z } from 'zod';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export interface ValidationIssue {
    path: (string | number)[];
    expected: string;
    actual: string;
}

export interface ValidationError {
    issues: ValidationIssue[];
}

/**
 * Capability interface for input/output shapes. Any structural typing layer can
 * implement it; `zodSchema` is the bundled adapter.
 */
export interface Schema<T = unknown> {
    validate(value: unknown): Result<T, ValidationError>;
}

export function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    if (value instanceof Date) return 'date';
    return typeof value;
}

function valueAt(value: unknown, path: (string | number)[]): unknown {
    let current = value;
    for (const segment of path) {
        if (current === null || typeof current !== 'object') return undefined;
        current = Reflect.get(current, segment);
    }
    return current;
}

export function zodSchema<S extends z.ZodTypeAny>(schema: S): Schema<z.output<S>> {
    return {
        validate(value) {
            const parsed = schema.safeParse(value);
            if (parsed.success) return ok(parsed.data);

            const issues = parsed.error.issues.map((issue): ValidationIssue => {
                if (issue.code === z.ZodIssueCode.invalid_type) {
                    return { path: issue.path, expected: issue.expected, actual: issue.received };
                }
                return { path: issue.path, expected: issue.message, actual: describeValue(valueAt(value, issue.path)) };
            });
            return err({ issues });
        },
    };
}

export function anyValue(): Schema<unknown> {
    return { validate: (value) => ok(value) };
}
