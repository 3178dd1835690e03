/**
 * @fileoverview Shared Storage Module
 *
 * Provides the MongoDB connection and the document store to every collection module.
 */

import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DATABASE_CONFIG, databaseConfigFactory } from './database.config';
import { DocumentStore } from './document-store';
import { MongoConnection } from './mongo-connection.provider';
import { MongoDocumentStore } from './mongo-document-store';

@Global()
@Module({
    providers: [
        {
            provide: DATABASE_CONFIG,
            inject: [ConfigService],
            useFactory: databaseConfigFactory,
        },
        MongoConnection,
        { provide: DocumentStore, useClass: MongoDocumentStore },
    ],
    exports: [DATABASE_CONFIG, MongoConnection, DocumentStore],
})
export class SharedStorageModule { }
