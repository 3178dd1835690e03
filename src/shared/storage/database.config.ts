import { ConfigService } from '@nestjs/config';

export const DATABASE_CONFIG = 'DATABASE_CONFIG';

/**
 * Connection settings for the document database.
 */
export interface DatabaseConfig {
    /** MongoDB connection string. Without it the store reports itself unavailable. */
    url?: string;

    /** Database name. Falls back to the database named in the connection string. */
    name?: string;

    serverSelectionTimeoutMs: number;
}

export function databaseConfigFactory(config: ConfigService): DatabaseConfig {
    return {
        url: config.get<string>('DATABASE_URL'),
        name: config.get<string>('DATABASE_NAME'),
        serverSelectionTimeoutMs: config.get<number>('DATABASE_TIMEOUT_MS') ?? 5000,
    };
}
