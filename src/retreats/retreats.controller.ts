/**
 * @fileoverview Retreats Controller
 */

import { Body, Controller, Get, Post, Query } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { CreatedDocument } from '../shared/collections';
import { filterQueryPipe, unwrapOrThrow } from '../shared/http';
import { StoredDocument } from '../shared/storage';
import { CreateRetreatDto, ListRetreatsQueryDto } from './dto';
import { RetreatsService } from './retreats.service';

@ApiTags('retreats')
@Controller('api/retreats')
export class RetreatsController {
    constructor(private retreatsService: RetreatsService) { }

    /**
     * Creates a retreat. Out-of-range durations and negative prices are
     * rejected with 422 before the store is touched.
     */
    @Post()
    @ApiOperation({ summary: 'Create retreat' })
    @ApiBody({ type: CreateRetreatDto })
    async create(@Body() retreat: CreateRetreatDto): Promise<CreatedDocument> {
        return unwrapOrThrow(await this.retreatsService.create(retreat));
    }

    @Get()
    @ApiOperation({ summary: 'List retreats', description: 'Optionally filtered by nature type' })
    @ApiQuery({ name: 'nature_type', required: false, example: 'forest' })
    async list(@Query(filterQueryPipe) query: ListRetreatsQueryDto): Promise<StoredDocument[]> {
        return unwrapOrThrow(await this.retreatsService.search(query));
    }
}
