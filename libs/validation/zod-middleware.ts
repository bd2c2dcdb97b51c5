import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

/**
 * Raised when a value crossing a boundary does not match its schema.
 */
export class ValidationViolationError extends Error {
    constructor(
        public readonly context: string,
        public readonly issues: readonly ValidationIssue[]
    ) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationViolationError';
    }
}

/**
 * Parses `data` against `schema`, throwing a typed error on failure.
 * Used at every boundary where external or caller data enters the core.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Payloads may carry statement text or credentials; only the issues are logged
        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new ValidationViolationError(context, errorDetails);
    }

    return result.data;
}
