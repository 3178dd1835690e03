/**
 * @fileoverview Health Service
 *
 * Liveness marker and database diagnostics. Diagnostics never throw: every
 * failure is rendered into the `database` status string.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { truncateDetail } from '../shared/http';
import { DATABASE_CONFIG, DatabaseConfig, MongoConnection, describeError } from '../shared/storage';

export const LIVENESS_MESSAGE = 'The Sanctuary of Nature Backend is alive';

/** Collection names included in the diagnostics report */
const MAX_REPORTED_COLLECTIONS = 10;

export interface Diagnostics {
    backend: string;
    database: string;
    database_url: string;
    database_name: string;
    connection_status: 'Connected' | 'Not Connected';
    collections: string[];
}

const isSet = (value: string | undefined): string => (value ? '✅ Set' : '❌ Not Set');

@Injectable()
export class HealthService {
    private readonly logger = new Logger(HealthService.name);

    constructor(
        private connection: MongoConnection,
        @Inject(DATABASE_CONFIG) private databaseConfig: DatabaseConfig,
    ) { }

    async diagnose(): Promise<Diagnostics> {
        const report: Diagnostics = {
            backend: '✅ Running',
            database: '❌ Not Available',
            database_url: isSet(this.databaseConfig.url),
            database_name: isSet(this.databaseConfig.name),
            connection_status: 'Not Connected',
            collections: [],
        };

        try {
            if (!this.connection.isConfigured()) {
                report.database = '⚠️ Not configured';
                return report;
            }

            const db = await this.connection.getDb();
            if (!db.ok) {
                report.database = `❌ Error: ${truncateDetail(db.error.message, 100)}`;
                return report;
            }

            report.database = '✅ Available';
            report.connection_status = 'Connected';

            const collections = await this.connection.listCollectionNames();
            if (collections.ok) {
                report.collections = collections.value.slice(0, MAX_REPORTED_COLLECTIONS);
                report.database = '✅ Connected & Working';
            } else {
                report.database = `⚠️ Connected but Error: ${truncateDetail(collections.error.message, 80)}`;
            }
        } catch (error) {
            this.logger.error({ msg: 'Diagnostics failed', error: describeError(error) });
            report.database = `❌ Error: ${truncateDetail(describeError(error), 100)}`;
        }

        return report;
    }
}
