import { Module, Global } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { z } from 'zod';

// Zod schema for environment validation
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.string().regex(/^\d+$/, 'PORT must be a number').transform(Number).default('8000'),

    // Document database. Without DATABASE_URL the store reports itself unavailable.
    DATABASE_URL: z.string().min(1).optional(),
    DATABASE_NAME: z.string().min(1).optional(),
    DATABASE_TIMEOUT_MS: z.string().regex(/^\d+$/).transform(Number).default('5000'),

    // Logging
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    LOKI_HOST: z.string().url().optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
    const result = envSchema.safeParse(config);
    if (!result.success) {
        console.error('Invalid environment configuration:');
        console.error(result.error.format());
        throw new Error('Invalid environment configuration');
    }
    return result.data;
}

@Global()
@Module({
    imports: [
        NestConfigModule.forRoot({
            isGlobal: true,
            cache: true,
            envFilePath: ['.env.local', '.env'],
            validate: validateEnv,
        }),
    ],
    exports: [NestConfigModule],
})
export class ConfigModule { }
