/**
 * @fileoverview Health Controller
 *
 * Unprefixed liveness and diagnostics routes.
 */

import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Diagnostics, HealthService, LIVENESS_MESSAGE } from './health.service';

@ApiTags('health')
@Controller()
export class HealthController {
    constructor(private healthService: HealthService) { }

    @Get()
    @ApiOperation({ summary: 'Liveness marker' })
    alive(): { message: string } {
        return { message: LIVENESS_MESSAGE };
    }

    /**
     * Reports backend and database status. Always answers 200, with or
     * without a reachable database.
     */
    @Get('test')
    @ApiOperation({ summary: 'Database diagnostics' })
    async diagnostics(): Promise<Diagnostics> {
        return this.healthService.diagnose();
    }
}
