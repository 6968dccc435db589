import Ajv, { ValidateFunction } from 'ajv';
import { ValidationRejectedError } from '../../domain/errors/GenerationErrors';

export const ajv = new Ajv({ allErrors: true });

/**
 * Validates a request body against a compiled schema, rejecting as a caller fault.
 */
export function parseBody<T>(validate: ValidateFunction<T>, body: unknown): T {
    if (!validate(body)) {
        throw new ValidationRejectedError('Invalid request body', ajv.errorsText(validate.errors, { dataVar: 'body' }));
    }
    return body;
}
