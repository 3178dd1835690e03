/**
 * Seed script for local development
 * Validates the sample data with the entity DTOs and inserts it into MongoDB
 */

import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import { validateOrReject } from 'class-validator';
import seedData from './seed-data.json';
import { CreateHostDto } from '../src/hosts/dto';
import { CreateLocationDto } from '../src/locations/dto';
import { CreateMessageDto } from '../src/messages/dto';
import { CreateRetreatDto } from '../src/retreats/dto';
import {
    CollectionName,
    DatabaseConfig,
    MongoConnection,
    MongoDocumentStore,
    describeError,
} from '../src/shared/storage';

// Configuration
const databaseConfig: DatabaseConfig = {
    url: process.env.DATABASE_URL || 'mongodb://localhost:27017',
    name: process.env.DATABASE_NAME || 'sanctuary',
    serverSelectionTimeoutMs: Number(process.env.DATABASE_TIMEOUT_MS) || 5000,
};

const connection = new MongoConnection(databaseConfig);
const store = new MongoDocumentStore(connection);

async function seedCollection<T extends object>(
    collection: CollectionName,
    dto: new () => T,
    records: object[],
): Promise<void> {
    console.log(`Seeding ${collection}...`);

    for (const record of records) {
        const entity = plainToInstance(dto, record);
        await validateOrReject(entity, { whitelist: true });

        const created = await store.createDocument(collection, entity);
        if (!created.ok) {
            throw new Error(`${collection}: ${created.error.message}`);
        }
    }

    console.log(`   ${records.length} ${collection} documents inserted`);
}

async function main(): Promise<void> {
    console.log('\nSanctuary Seed Script\n');

    try {
        await seedCollection('host', CreateHostDto, seedData.hosts);
        await seedCollection('location', CreateLocationDto, seedData.locations);
        await seedCollection('retreat', CreateRetreatDto, seedData.retreats);
        await seedCollection('message', CreateMessageDto, seedData.messages);
        console.log('\nSeed complete\n');
    } catch (error) {
        console.error('\nSeed failed:', describeError(error));
        process.exitCode = 1;
    } finally {
        await connection.onApplicationShutdown();
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
