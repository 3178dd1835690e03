/**
 * @fileoverview Validation Pipes
 *
 * Request bodies are validated against the entity DTOs before any handler runs.
 */

import {
    ArgumentMetadata,
    BadRequestException,
    PipeTransform,
    UnprocessableEntityException,
    ValidationError,
    ValidationPipe,
} from '@nestjs/common';

export interface FieldViolation {
    field: string;
    constraints: string[];
}

export function flattenValidationErrors(errors: ValidationError[], parent?: string): FieldViolation[] {
    return errors.flatMap((error) => {
        const field = parent ? `${parent}.${error.property}` : error.property;
        const own: FieldViolation[] = error.constraints
            ? [{ field, constraints: Object.values(error.constraints) }]
            : [];
        return [...own, ...flattenValidationErrors(error.children ?? [], field)];
    });
}

/**
 * Global pipe for request bodies: strips unknown properties and answers 422
 * with field-level detail. Other arguments pass through untouched and are
 * validated by their own pipes.
 */
export class BodyValidationPipe extends ValidationPipe {
    constructor() {
        super({
            transform: true,
            whitelist: true,
            exceptionFactory: (errors: ValidationError[]) =>
                new UnprocessableEntityException({
                    statusCode: 422,
                    error: 'Unprocessable Entity',
                    detail: flattenValidationErrors(errors),
                }),
        });
    }

    async transform(value: unknown, metadata: ArgumentMetadata): Promise<unknown> {
        if (metadata.type !== 'body') return value;
        return super.transform(value, metadata);
    }
}

/**
 * Query-string pipe for list endpoints: parameters that are not declared
 * filters are rejected with 400.
 */
export const filterQueryPipe = new ValidationPipe({
    transform: true,
    whitelist: true,
    forbidNonWhitelisted: true,
});

/**
 * Query-string pipe for list endpoints that declare no filters. Any parameter
 * is rejected with 400, in the same shape `filterQueryPipe` uses.
 */
export class NoQueryParamsPipe implements PipeTransform<unknown, Record<string, never>> {
    transform(value: unknown): Record<string, never> {
        const names = typeof value === 'object' && value !== null ? Object.keys(value) : [];
        if (names.length > 0) {
            throw new BadRequestException(names.map((name) => `property ${name} should not exist`));
        }
        return {};
    }
}
