/**
 * @fileoverview Store Error Mapping
 *
 * The one place where storage failures become HTTP responses.
 */

import { BadRequestException, HttpException, InternalServerErrorException } from '@nestjs/common';
import { Result } from '../result';
import { StoreError } from '../storage/storage-errors';

/** Longest failure text echoed back to the caller */
export const MAX_DETAIL_LENGTH = 200;

export function truncateDetail(text: string, max = MAX_DETAIL_LENGTH): string {
    return text.length > max ? text.slice(0, max) : text;
}

export function toHttpException(error: StoreError): HttpException {
    const detail = truncateDetail(error.message);

    if (error.kind === 'invalid_filter') {
        return new BadRequestException({ statusCode: 400, error: 'Bad Request', detail });
    }

    return new InternalServerErrorException({ statusCode: 500, error: 'Internal Server Error', detail });
}

/**
 * Returns the success value or throws the mapped HTTP exception.
 */
export function unwrapOrThrow<T>(result: Result<T, StoreError>): T {
    if (!result.ok) {
        throw toHttpException(result.error);
    }
    return result.value;
}
