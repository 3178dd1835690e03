/**
 * @fileoverview Hosts Controller
 */

import { Body, Controller, Get, Post, Query } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { CreatedDocument } from '../shared/collections';
import { NoQueryParamsPipe, unwrapOrThrow } from '../shared/http';
import { StoredDocument } from '../shared/storage';
import { CreateHostDto } from './dto';
import { HostsService } from './hosts.service';

@ApiTags('hosts')
@Controller('api/hosts')
export class HostsController {
    constructor(private hostsService: HostsService) { }

    @Post()
    @ApiOperation({ summary: 'Create host' })
    @ApiBody({ type: CreateHostDto })
    async create(@Body() host: CreateHostDto): Promise<CreatedDocument> {
        return unwrapOrThrow(await this.hostsService.create(host));
    }

    /**
     * Hosts have no filters, so any query parameter is rejected.
     */
    @Get()
    @ApiOperation({ summary: 'List hosts' })
    async list(@Query(NoQueryParamsPipe) _query: Record<string, never>): Promise<StoredDocument[]> {
        return unwrapOrThrow(await this.hostsService.list());
    }
}
