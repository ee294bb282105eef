import { z, type ZodTypeAny } from 'zod';
import { logger } from '../logging/logger.js';

/**
 * Validation helper.
 * Parses untrusted input (environment, middleware options) and throws on failure.
 * Issues are logged with their path and message.
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown, context: string): z.output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new Error(`Validation Violation in ${context}: ${JSON.stringify(errorDetails)}`);
    }

    return result.data;
}

/**
 * Factory for reusable validators bound to one schema.
 */
export const createValidator = <S extends ZodTypeAny>(schema: S) => {
    return (data: unknown, contextLabel: string): z.output<S> => validate(schema, data, contextLabel);
};
