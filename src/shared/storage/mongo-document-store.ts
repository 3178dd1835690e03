/**
 * @fileoverview MongoDB Document Store
 *
 * {@link DocumentStore} backed by the lazily connected {@link MongoConnection}.
 */

import { Injectable } from '@nestjs/common';
import type { Document, WithId } from 'mongodb';
import { Result, ok, err } from '../result';
import { CollectionName, DocumentFilter, checkFilter, toMongoFilter } from './document-filter';
import { DEFAULT_LIST_LIMIT, DocumentStore, StoredDocument } from './document-store';
import { MongoConnection } from './mongo-connection.provider';
import { StoreError, readError, writeError } from './storage-errors';

@Injectable()
export class MongoDocumentStore extends DocumentStore {
    constructor(private readonly connection: MongoConnection) {
        super();
    }

    async createDocument<T extends object>(
        collection: CollectionName,
        record: T,
    ): Promise<Result<string, StoreError>> {
        const db = await this.connection.getDb();
        if (!db.ok) return db;

        // insertOne assigns _id on the object it receives, so it gets a copy
        const now = new Date();
        const document: Document = {
            ...Object.fromEntries(Object.entries(record)),
            created_at: now,
            updated_at: now,
        };

        try {
            const result = await db.value.collection(collection).insertOne(document);
            return ok(String(result.insertedId));
        } catch (error) {
            return err(writeError(collection, error));
        }
    }

    async getDocuments(
        collection: CollectionName,
        filter: DocumentFilter = {},
        limit = DEFAULT_LIST_LIMIT,
    ): Promise<Result<StoredDocument[], StoreError>> {
        const checked = checkFilter(collection, filter);
        if (!checked.ok) return checked;

        const db = await this.connection.getDb();
        if (!db.ok) return db;

        try {
            const documents = await db.value
                .collection(collection)
                .find(toMongoFilter(checked.value))
                .limit(limit)
                .toArray();

            return ok(documents.map(toStoredDocument));
        } catch (error) {
            return err(readError(collection, error));
        }
    }
}

function toStoredDocument({ _id, ...fields }: WithId<Document>): StoredDocument {
    return { ...fields, id: String(_id) };
}
