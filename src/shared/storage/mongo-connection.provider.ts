/**
 * @fileoverview MongoDB Connection Provider
 *
 * Owns the process-wide MongoDB client. The client is created on first use
 * from an explicit {@link DatabaseConfig} and reused until shutdown.
 *
 * @remarks
 * Without a connection string every call resolves to a `storage_unavailable`
 * error, so the application still boots and its diagnostics endpoint keeps
 * answering.
 */

import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { Db, MongoClient } from 'mongodb';
import { Result, ok, err } from '../result';
import { DATABASE_CONFIG, DatabaseConfig } from './database.config';
import { StoreError, describeError, readError, storageUnavailable } from './storage-errors';

/* -------------------------------------------------------------------------- */
/*                              Provider Implementation                        */
/* -------------------------------------------------------------------------- */

@Injectable()
export class MongoConnection implements OnApplicationShutdown {
    private readonly logger = new Logger(MongoConnection.name);

    /** Connected client, set once the first connection attempt succeeds */
    private client: MongoClient | null = null;

    /** In-flight or completed connection shared by concurrent callers */
    private pending: Promise<Db> | null = null;

    constructor(@Inject(DATABASE_CONFIG) private readonly config: DatabaseConfig) { }

    isConfigured(): boolean {
        return Boolean(this.config.url);
    }

    /**
     * Returns the database handle, connecting on the first call.
     *
     * @remarks
     * A failed attempt is not cached: the next call tries to connect again.
     * Nothing here retries within a single call.
     */
    async getDb(): Promise<Result<Db, StoreError>> {
        const url = this.config.url;
        if (!url) {
            return err(storageUnavailable('Database is not configured (DATABASE_URL is not set)'));
        }

        try {
            return ok(await this.connect(url));
        } catch (error) {
            this.logger.warn({ msg: 'Database connection failed', error: describeError(error) });
            return err(storageUnavailable(`Database connection failed: ${describeError(error)}`));
        }
    }

    /**
     * Lists collection names of the configured database.
     */
    async listCollectionNames(): Promise<Result<string[], StoreError>> {
        const db = await this.getDb();
        if (!db.ok) return db;

        try {
            const collections = await db.value.listCollections({}, { nameOnly: true }).toArray();
            return ok(collections.map((collection) => collection.name));
        } catch (error) {
            return err(readError('*', error));
        }
    }

    /**
     * Closes the client, waiting first for a connection attempt still in
     * flight so a client that connects during shutdown is closed too.
     */
    async onApplicationShutdown(): Promise<void> {
        const pending = this.pending;
        this.pending = null;

        if (pending) {
            await pending.then(
                () => undefined,
                (error: unknown) =>
                    this.logger.debug({ msg: 'Connection attempt failed during shutdown', error: describeError(error) }),
            );
        }

        if (this.client) {
            await this.client.close();
            this.client = null;
        }
    }

    private connect(url: string): Promise<Db> {
        if (!this.pending) {
            const client = new MongoClient(url, {
                serverSelectionTimeoutMS: this.config.serverSelectionTimeoutMs,
            });

            this.pending = client
                .connect()
                .then((connected) => {
                    this.client = connected;
                    const db = connected.db(this.config.name);
                    this.logger.log({ msg: 'Connected to database', database: db.databaseName });
                    return db;
                })
                .catch((error: unknown) => {
                    this.pending = null;
                    throw error;
                });
        }

        return this.pending;
    }
}
