/**
 * @fileoverview Community Messages Controller
 */

import { Body, Controller, Get, Post, Query } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { CreatedDocument } from '../shared/collections';
import { filterQueryPipe, unwrapOrThrow } from '../shared/http';
import { StoredDocument } from '../shared/storage';
import { CreateMessageDto, ListMessagesQueryDto } from './dto';
import { MessagesService } from './messages.service';

@ApiTags('messages')
@Controller('api/messages')
export class MessagesController {
    constructor(private messagesService: MessagesService) { }

    @Post()
    @ApiOperation({ summary: 'Post community message' })
    @ApiBody({ type: CreateMessageDto })
    async create(@Body() message: CreateMessageDto): Promise<CreatedDocument> {
        return unwrapOrThrow(await this.messagesService.create(message));
    }

    @Get()
    @ApiOperation({ summary: 'List community messages', description: 'Optionally filtered by topic' })
    @ApiQuery({ name: 'topic', required: false, example: 'rideshare' })
    async list(@Query(filterQueryPipe) query: ListMessagesQueryDto): Promise<StoredDocument[]> {
        return unwrapOrThrow(await this.messagesService.search(query));
    }
}
