/**
 * @fileoverview Storage Errors
 *
 * Typed failures produced by the document store. Handlers receive these as
 * values and map them to HTTP responses at the controller boundary.
 */

export type StoreErrorKind = 'storage_unavailable' | 'write_error' | 'read_error' | 'invalid_filter';

export interface StorageUnavailableError {
    kind: 'storage_unavailable';
    message: string;
}

export interface WriteError {
    kind: 'write_error';
    collection: string;
    message: string;
}

export interface ReadError {
    kind: 'read_error';
    collection: string;
    message: string;
}

export interface InvalidFilterError {
    kind: 'invalid_filter';
    collection: string;
    message: string;

    /** Filter keys that are not declared for the collection */
    fields: string[];
}

export type StoreError = StorageUnavailableError | WriteError | ReadError | InvalidFilterError;

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

export const storageUnavailable = (message: string): StorageUnavailableError => ({
    kind: 'storage_unavailable',
    message,
});

export const writeError = (collection: string, cause: unknown): WriteError => ({
    kind: 'write_error',
    collection,
    message: describeError(cause),
});

export const readError = (collection: string, cause: unknown): ReadError => ({
    kind: 'read_error',
    collection,
    message: describeError(cause),
});
