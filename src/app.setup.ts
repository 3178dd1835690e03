/**
 * @fileoverview HTTP Application Setup
 *
 * Settings shared by the server bootstrap and the HTTP tests.
 */

import { INestApplication } from '@nestjs/common';
import { BodyValidationPipe } from './shared/http';

export function configureApp(app: INestApplication): INestApplication {
    // Public demo API: any origin, method and header
    app.enableCors({
        origin: true,
        credentials: true,
        methods: ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE', 'OPTIONS'],
    });

    app.useGlobalPipes(new BodyValidationPipe());

    return app;
}
