/**
 * @fileoverview Logger Configuration
 *
 * pino-http options per environment:
 * - production: JSON to stdout
 * - development: pino-pretty, plus Loki when LOKI_HOST is set
 * - test: silent, no transport workers
 */

import { ConfigService } from '@nestjs/config';
import type { Params } from 'nestjs-pino';
import type { TransportTargetOptions } from 'pino';

export function loggerOptionsFactory(config: ConfigService): Params {
    const env = config.get<string>('NODE_ENV') ?? 'development';
    const lokiHost = config.get<string>('LOKI_HOST');
    const defaultLevel = env === 'production' ? 'info' : env === 'test' ? 'silent' : 'debug';
    const level = config.get<string>('LOG_LEVEL') ?? defaultLevel;

    const targets: TransportTargetOptions[] = [
        {
            target: 'pino-pretty',
            level,
            options: { colorize: true },
        },
    ];

    if (lokiHost) {
        targets.push({
            target: 'pino-loki',
            level: 'info',
            options: {
                host: lokiHost,
                labels: { app: 'sanctuary-api' },
                batching: true,
                interval: 5,
            },
        });
    }

    return {
        pinoHttp: {
            level,
            transport: env === 'development' ? { targets } : undefined,
            redact: ['req.headers.authorization', 'req.headers.cookie', 'res.headers["set-cookie"]'],
        },
    };
}
