import { ObjectId } from 'mongodb';
import { ok, err } from '../result';
import { eq, lte } from './document-filter';
import { MongoConnection } from './mongo-connection.provider';
import { MongoDocumentStore } from './mongo-document-store';
import { storageUnavailable } from './storage-errors';

describe('MongoDocumentStore', () => {
    let store: MongoDocumentStore;
    let mockConnection: { getDb: jest.Mock };
    let mockCollection: { insertOne: jest.Mock; find: jest.Mock };
    let mockCursor: { limit: jest.Mock; toArray: jest.Mock };
    let mockDb: { collection: jest.Mock };

    const insertedId = new ObjectId('65f0c0ffee0000000000abcd');

    beforeEach(() => {
        mockCursor = {
            limit: jest.fn(),
            toArray: jest.fn().mockResolvedValue([
                { _id: insertedId, title: 'Forest Silence', nature_type: 'forest' },
            ]),
        };
        mockCursor.limit.mockReturnValue(mockCursor);

        mockCollection = {
            insertOne: jest.fn().mockResolvedValue({ acknowledged: true, insertedId }),
            find: jest.fn().mockReturnValue(mockCursor),
        };
        mockDb = { collection: jest.fn().mockReturnValue(mockCollection) };
        mockConnection = { getDb: jest.fn().mockResolvedValue(ok(mockDb)) };

        store = new MongoDocumentStore(mockConnection as unknown as MongoConnection);
    });

    describe('createDocument', () => {
        it('inserts into the named collection and returns the id as a string', async () => {
            const result = await store.createDocument('retreat', { title: 'Forest Silence' });

            expect(mockDb.collection).toHaveBeenCalledWith('retreat');
            expect(result).toEqual({ ok: true, value: '65f0c0ffee0000000000abcd' });
        });

        it('stamps timestamps on a copy without touching the caller record', async () => {
            const record = { author: 'river-walker', content: 'hello' };
            await store.createDocument('message', record);

            const inserted = mockCollection.insertOne.mock.calls[0][0];
            expect(inserted).not.toBe(record);
            expect(inserted).toMatchObject({ author: 'river-walker', content: 'hello' });
            expect(inserted.created_at).toBeInstanceOf(Date);
            expect(inserted.updated_at).toEqual(inserted.created_at);
            expect(record).toEqual({ author: 'river-walker', content: 'hello' });
        });

        it('returns write_error when the insert fails', async () => {
            mockCollection.insertOne.mockRejectedValue(new Error('E11000 duplicate key'));

            const result = await store.createDocument('host', { name: 'Amara' });

            expect(result).toEqual({
                ok: false,
                error: { kind: 'write_error', collection: 'host', message: 'E11000 duplicate key' },
            });
        });

        it('passes storage_unavailable through without touching a collection', async () => {
            mockConnection.getDb.mockResolvedValue(err(storageUnavailable('offline')));

            const result = await store.createDocument('host', { name: 'Amara' });

            expect(result).toEqual({ ok: false, error: { kind: 'storage_unavailable', message: 'offline' } });
            expect(mockDb.collection).not.toHaveBeenCalled();
        });
    });

    describe('getDocuments', () => {
        it('rewrites _id into a string id', async () => {
            const result = await store.getDocuments('retreat');

            expect(result).toEqual({
                ok: true,
                value: [{ id: '65f0c0ffee0000000000abcd', title: 'Forest Silence', nature_type: 'forest' }],
            });
        });

        it('translates the filter and applies the default limit of 100', async () => {
            await store.getDocuments('retreat', { nature_type: eq('forest'), price_usd: lte(0) });

            expect(mockCollection.find).toHaveBeenCalledWith({ nature_type: 'forest', price_usd: { $lte: 0 } });
            expect(mockCursor.limit).toHaveBeenCalledWith(100);
        });

        it('applies an explicit limit', async () => {
            await store.getDocuments('retreat', {}, 8);

            expect(mockCursor.limit).toHaveBeenCalledWith(8);
        });

        it('rejects undeclared filter fields before connecting', async () => {
            const result = await store.getDocuments('message', { author: eq('river-walker') });

            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.kind).toBe('invalid_filter');
            expect(mockConnection.getDb).not.toHaveBeenCalled();
        });

        it('returns read_error when the query fails', async () => {
            mockCursor.toArray.mockRejectedValue(new Error('cursor killed'));

            const result = await store.getDocuments('location');

            expect(result).toEqual({
                ok: false,
                error: { kind: 'read_error', collection: 'location', message: 'cursor killed' },
            });
        });
    });
});
