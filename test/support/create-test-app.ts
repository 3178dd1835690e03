import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { AppModule } from '../../src/app.module';
import { configureApp } from '../../src/app.setup';
import { DATABASE_CONFIG, DatabaseConfig, DocumentStore } from '../../src/shared/storage';
import { InMemoryDocumentStore } from './in-memory-document-store';

export interface TestApp {
    app: INestApplication;
    store: InMemoryDocumentStore;
}

/**
 * Boots the full application with the document store replaced by an
 * in-memory one and no database configured.
 */
export async function createTestApp(): Promise<TestApp> {
    const store = new InMemoryDocumentStore();
    const databaseConfig: DatabaseConfig = { serverSelectionTimeoutMs: 100 };

    const moduleFixture = await Test.createTestingModule({
        imports: [AppModule],
    })
        .overrideProvider(DATABASE_CONFIG)
        .useValue(databaseConfig)
        .overrideProvider(DocumentStore)
        .useValue(store)
        .compile();

    const app = moduleFixture.createNestApplication({ logger: false });
    configureApp(app);
    await app.init();

    return { app, store };
}
