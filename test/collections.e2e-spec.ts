import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { createTestApp } from './support/create-test-app';
import { InMemoryDocumentStore } from './support/in-memory-document-store';

const retreat = (overrides: Record<string, unknown> = {}) => ({
    title: 'Seven Days of Forest Silence',
    host_name: 'Test Host',
    location_title: 'Test Grove',
    nature_type: 'forest',
    focus: ['silence'],
    duration_days: 7,
    price_usd: 1200,
    ...overrides,
});

describe('Collection API E2E Tests', () => {
    let app: INestApplication;
    let store: InMemoryDocumentStore;

    beforeAll(async () => {
        ({ app, store } = await createTestApp());
    });

    afterAll(async () => {
        await app.close();
    });

    beforeEach(() => {
        store.reset();
        jest.restoreAllMocks();
    });

    describe('Hosts', () => {
        it('POST /api/hosts - should create and default specialties', async () => {
            await request(app.getHttpServer())
                .post('/api/hosts')
                .send({ name: 'Test Host', bio: 'Walks slowly' })
                .expect(201)
                .expect({ id: 'doc-1', status: 'created' });

            const res = await request(app.getHttpServer()).get('/api/hosts').expect(200);
            expect(res.body).toEqual([
                { id: 'doc-1', name: 'Test Host', bio: 'Walks slowly', specialties: [] },
            ]);
        });

        it('POST /api/hosts - should reject a missing name with 422', async () => {
            const res = await request(app.getHttpServer()).post('/api/hosts').send({ bio: 'nameless' }).expect(422);

            expect(res.body.statusCode).toBe(422);
            expect(res.body.error).toBe('Unprocessable Entity');
            expect(res.body.detail).toEqual([
                { field: 'name', constraints: expect.arrayContaining(['name should not be empty']) },
            ]);
        });

        it('POST /api/hosts - should strip unknown properties', async () => {
            await request(app.getHttpServer())
                .post('/api/hosts')
                .send({ name: 'Test Host', role: 'admin' })
                .expect(201);

            const res = await request(app.getHttpServer()).get('/api/hosts').expect(200);
            expect(res.body[0]).not.toHaveProperty('role');
        });

        it('GET /api/hosts - should reject any query parameter with 400', async () => {
            await request(app.getHttpServer()).post('/api/hosts').send({ name: 'Test Host' }).expect(201);

            const res = await request(app.getHttpServer()).get('/api/hosts?name=Test%20Host').expect(400);
            expect(res.body.message).toEqual(['property name should not exist']);
        });
    });

    describe('Locations', () => {
        it('GET /api/locations - should filter by region', async () => {
            await request(app.getHttpServer())
                .post('/api/locations')
                .send({ title: 'North Grove', region: 'North', nature_type: 'forest' })
                .expect(201);
            await request(app.getHttpServer())
                .post('/api/locations')
                .send({ title: 'South Dunes', region: 'South', nature_type: 'desert' })
                .expect(201);

            const res = await request(app.getHttpServer()).get('/api/locations?region=South').expect(200);
            expect(res.body).toEqual([
                { id: 'doc-2', title: 'South Dunes', region: 'South', nature_type: 'desert' },
            ]);
        });

        it('POST /api/locations - should require nature_type', () => {
            return request(app.getHttpServer())
                .post('/api/locations')
                .send({ title: 'Nowhere', region: 'North' })
                .expect(422);
        });
    });

    describe('Retreats', () => {
        it('should list a created retreat with its id', async () => {
            const created = await request(app.getHttpServer()).post('/api/retreats').send(retreat()).expect(201);

            const res = await request(app.getHttpServer()).get('/api/retreats').expect(200);
            expect(res.body).toHaveLength(1);
            expect(res.body[0]).toEqual({ ...retreat(), id: created.body.id });
        });

        it.each([0, 61])('should reject duration_days=%d before reaching the store', async (duration) => {
            const spy = jest.spyOn(store, 'createDocument');

            const res = await request(app.getHttpServer())
                .post('/api/retreats')
                .send(retreat({ duration_days: duration }))
                .expect(422);

            expect(res.body.detail.map((violation: { field: string }) => violation.field)).toEqual(['duration_days']);
            expect(spy).not.toHaveBeenCalled();
        });

        it('should reject a negative price', async () => {
            const res = await request(app.getHttpServer())
                .post('/api/retreats')
                .send(retreat({ price_usd: -1 }))
                .expect(422);

            expect(res.body.detail).toEqual([
                { field: 'price_usd', constraints: ['price_usd must not be less than 0'] },
            ]);
        });

        it('should filter nature_type exactly and case-sensitively', async () => {
            for (const natureType of ['forest', 'Forest', 'forest-edge', 'ocean']) {
                await request(app.getHttpServer())
                    .post('/api/retreats')
                    .send(retreat({ title: `Retreat ${natureType}`, nature_type: natureType }))
                    .expect(201);
            }

            const res = await request(app.getHttpServer()).get('/api/retreats?nature_type=forest').expect(200);
            expect(res.body.map((doc: { title: string }) => doc.title)).toEqual(['Retreat forest']);
        });

        it('should ignore an empty filter value', async () => {
            await request(app.getHttpServer()).post('/api/retreats').send(retreat()).expect(201);
            await request(app.getHttpServer())
                .post('/api/retreats')
                .send(retreat({ nature_type: 'ocean' }))
                .expect(201);

            const res = await request(app.getHttpServer()).get('/api/retreats?nature_type=').expect(200);
            expect(res.body).toHaveLength(2);
        });

        it('should reject an unknown query parameter with 400', () => {
            return request(app.getHttpServer()).get('/api/retreats?price_usd=10').expect(400);
        });
    });

    describe('Messages', () => {
        it('GET /api/messages - should filter by topic', async () => {
            await request(app.getHttpServer())
                .post('/api/messages')
                .send({ author: 'river-walker', content: 'Anyone driving Friday?', topic: 'rideshare' })
                .expect(201);
            await request(app.getHttpServer())
                .post('/api/messages')
                .send({ author: 'fern', content: 'Hello all' })
                .expect(201);

            const res = await request(app.getHttpServer()).get('/api/messages?topic=rideshare').expect(200);
            expect(res.body).toEqual([
                { id: 'doc-1', author: 'river-walker', content: 'Anyone driving Friday?', topic: 'rideshare' },
            ]);
        });
    });

    describe('Storage failures', () => {
        it('should answer 500 with the failure detail when the store is unavailable', async () => {
            store.offline = true;

            const res = await request(app.getHttpServer()).get('/api/messages').expect(500);
            expect(res.body).toEqual({
                statusCode: 500,
                error: 'Internal Server Error',
                detail: 'Database is not configured (DATABASE_URL is not set)',
            });
        });

        it('should answer 500 on create when the store is unavailable', async () => {
            store.offline = true;

            await request(app.getHttpServer()).post('/api/hosts').send({ name: 'Test Host' }).expect(500);
        });
    });
});
