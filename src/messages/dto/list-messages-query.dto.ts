import { IsOptional, IsString } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { MessageListQuery } from '../interfaces';

export class ListMessagesQueryDto implements MessageListQuery {
    @ApiPropertyOptional({ example: 'rideshare', description: 'Exact topic match' })
    @IsOptional()
    @IsString()
    topic?: string;
}
