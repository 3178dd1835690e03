/**
 * @fileoverview Locations Controller
 */

import { Body, Controller, Get, Post, Query } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { CreatedDocument } from '../shared/collections';
import { filterQueryPipe, unwrapOrThrow } from '../shared/http';
import { StoredDocument } from '../shared/storage';
import { CreateLocationDto, ListLocationsQueryDto } from './dto';
import { LocationsService } from './locations.service';

@ApiTags('locations')
@Controller('api/locations')
export class LocationsController {
    constructor(private locationsService: LocationsService) { }

    @Post()
    @ApiOperation({ summary: 'Create location' })
    @ApiBody({ type: CreateLocationDto })
    async create(@Body() location: CreateLocationDto): Promise<CreatedDocument> {
        return unwrapOrThrow(await this.locationsService.create(location));
    }

    @Get()
    @ApiOperation({ summary: 'List locations', description: 'Optionally filtered by nature type and region' })
    @ApiQuery({ name: 'nature_type', required: false, example: 'forest' })
    @ApiQuery({ name: 'region', required: false })
    async list(@Query(filterQueryPipe) query: ListLocationsQueryDto): Promise<StoredDocument[]> {
        return unwrapOrThrow(await this.locationsService.search(query));
    }
}
