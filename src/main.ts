// OpenTelemetry must be imported FIRST before any other imports
import './shared/tracing/tracing';
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap(): Promise<void> {
    const app = await NestFactory.create(AppModule, { bufferLogs: true });

    // Use Pino logger
    const logger = app.get(Logger);
    app.useLogger(logger);
    app.enableShutdownHooks();

    configureApp(app);

    // Swagger API documentation
    const config = new DocumentBuilder()
        .setTitle('The Sanctuary of Nature API')
        .setDescription('Hosts, locations, retreats, community messages and retreat recommendations')
        .setVersion('1.0')
        .addTag('hosts', 'Retreat hosts and facilitators')
        .addTag('locations', 'Sanctuaries and places')
        .addTag('retreats', 'Retreat listings')
        .addTag('messages', 'Community board')
        .addTag('recommendations', 'Rule-based retreat matching')
        .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api-docs', app, document);

    const port = app.get(ConfigService).get<number>('PORT') ?? 8000;
    await app.listen(port, '0.0.0.0');

    logger.log(`Sanctuary API running on http://localhost:${port}`);
    logger.log(`Swagger docs available at http://localhost:${port}/api-docs`);
}

bootstrap().catch((error: unknown) => {
    console.error('Failed to start application', error);
    process.exit(1);
});
