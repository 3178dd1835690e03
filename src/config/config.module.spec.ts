import { validateEnv } from './config.module';

describe('validateEnv', () => {
    it('applies defaults when nothing is set', () => {
        expect(validateEnv({})).toEqual({
            NODE_ENV: 'development',
            PORT: 8000,
            DATABASE_TIMEOUT_MS: 5000,
        });
    });

    it('parses numeric settings and keeps database settings', () => {
        const config = validateEnv({
            NODE_ENV: 'production',
            PORT: '3001',
            DATABASE_URL: 'mongodb://localhost:27017',
            DATABASE_NAME: 'sanctuary',
        });

        expect(config.PORT).toBe(3001);
        expect(config.DATABASE_URL).toBe('mongodb://localhost:27017');
        expect(config.DATABASE_NAME).toBe('sanctuary');
    });

    it('drops variables it does not know', () => {
        expect(validateEnv({ HOME: '/root' })).not.toHaveProperty('HOME');
    });

    it('rejects a non-numeric port', () => {
        const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        expect(() => validateEnv({ PORT: 'eighty' })).toThrow('Invalid environment configuration');
        spy.mockRestore();
    });
});
