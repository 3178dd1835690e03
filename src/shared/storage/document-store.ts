/**
 * @fileoverview Document Store
 *
 * Storage contract shared by every collection. Injected by its abstract class
 * so the MongoDB implementation can be swapped for an in-process store.
 */

import { Result } from '../result';
import { CollectionName, DocumentFilter } from './document-filter';
import { StoreError } from './storage-errors';

/** Maximum number of documents returned by a list call unless a caller asks for fewer. */
export const DEFAULT_LIST_LIMIT = 100;

/**
 * A persisted document as returned to callers: the store identifier is
 * exposed as a plain string `id`.
 */
export type StoredDocument = { id: string } & Record<string, unknown>;

export abstract class DocumentStore {
    /**
     * Inserts a copy of `record` into the collection and returns the new id.
     */
    abstract createDocument<T extends object>(
        collection: CollectionName,
        record: T,
    ): Promise<Result<string, StoreError>>;

    /**
     * Returns up to `limit` documents matching `filter`, in store order.
     */
    abstract getDocuments(
        collection: CollectionName,
        filter?: DocumentFilter,
        limit?: number,
    ): Promise<Result<StoredDocument[], StoreError>>;
}
