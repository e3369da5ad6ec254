import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { ValidationError } from '../errors/coordinationErrors.js';

export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Parses untrusted data (wire frames, config files, request bodies) and
 * throws a ValidationError listing every issue on failure.
 */
export function validate<T>(schema: Schema<T>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Payloads may hold file contents; only the issues are logged.
        logger.warn({
            context,
            errors: errorDetails
        }, "Input validation failure");

        throw new ValidationError(`Validation failed in ${context}: ${JSON.stringify(errorDetails)}`, errorDetails);
    }

    return result.data;
}

/**
 * Factory for reusable validators bound to one schema.
 */
export const createValidator = <T>(schema: Schema<T>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
