/**
 * @fileoverview Storage Barrel Export
 */

export * from './storage.module';
export * from './database.config';
export * from './document-filter';
export * from './document-store';
export * from './mongo-connection.provider';
export * from './mongo-document-store';
export * from './storage-errors';
