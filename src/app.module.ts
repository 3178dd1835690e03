/**
 * @fileoverview Application Root Module
 *
 * Configures the NestJS application with logging, metrics, storage and the
 * collection, recommendation and health modules.
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule } from './config/config.module';
import { loggerOptionsFactory } from './config/logger.config';
import { SharedStorageModule } from './shared/storage';
import { HealthModule } from './health/health.module';
import { HostsModule } from './hosts';
import { LocationsModule } from './locations';
import { RetreatsModule } from './retreats';
import { MessagesModule } from './messages';
import { RecommendationsModule } from './recommendations';

@Module({
    imports: [
        // Shared modules
        ConfigModule,

        // Logging
        LoggerModule.forRootAsync({
            inject: [ConfigService],
            useFactory: loggerOptionsFactory,
        }),

        // Metrics
        PrometheusModule.register({
            path: '/metrics',
            defaultMetrics: { enabled: true },
        }),

        SharedStorageModule,

        // Feature modules
        HealthModule,
        HostsModule,
        LocationsModule,
        RetreatsModule,
        MessagesModule,
        RecommendationsModule,
    ],
})
export class AppModule { }
