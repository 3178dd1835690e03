/**
 * @fileoverview Collection Service
 *
 * Create/list operations shared by every entity collection. Each entity
 * module binds a subclass to its collection name.
 */

import { Logger } from '@nestjs/common';
import { Counter } from 'prom-client';
import { Result } from '../result';
import {
    CollectionName,
    DEFAULT_LIST_LIMIT,
    DocumentFilter,
    DocumentStore,
    StoreError,
    StoreErrorKind,
    StoredDocument,
} from '../storage';

const operationCounter = new Counter({
    name: 'sanctuary_collection_operations_total',
    help: 'Total number of collection create/list operations',
    labelNames: ['collection', 'operation', 'status'],
});

type CollectionOperation = 'create' | 'list';

/** Counter status label: `success`, or the kind of store failure */
export type OperationStatus = 'success' | StoreErrorKind;

export interface CreatedDocument {
    id: string;
    status: 'created';
}

export abstract class CollectionService<T extends object> {
    protected readonly logger: Logger;

    protected constructor(
        protected readonly store: DocumentStore,
        readonly collection: CollectionName,
    ) {
        this.logger = new Logger(`${collection}-collection`);
    }

    async create(entity: T): Promise<Result<CreatedDocument, StoreError>> {
        const result = await this.store.createDocument(this.collection, entity);

        if (!result.ok) {
            this.recordFailure('create', result.error);
            return result;
        }

        this.count('create', 'success');
        this.logger.log({ msg: 'Document created', collection: this.collection, id: result.value });
        return { ok: true, value: { id: result.value, status: 'created' } };
    }

    async list(filter: DocumentFilter = {}, limit = DEFAULT_LIST_LIMIT): Promise<Result<StoredDocument[], StoreError>> {
        const result = await this.store.getDocuments(this.collection, filter, limit);

        if (!result.ok) {
            this.recordFailure('list', result.error);
            return result;
        }

        this.count('list', 'success');
        this.logger.debug({ msg: 'Documents listed', collection: this.collection, filter, resultCount: result.value.length });
        return result;
    }

    private count(operation: CollectionOperation, status: OperationStatus): void {
        operationCounter.inc({ collection: this.collection, operation, status });
    }

    private recordFailure(operation: CollectionOperation, error: StoreError): void {
        this.count(operation, error.kind);
        this.logger.warn({ msg: 'Collection operation failed', collection: this.collection, operation, kind: error.kind, error: error.message });
    }
}
