import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { MESSAGE_TOPICS, Message } from '../interfaces';

export class CreateMessageDto implements Message {
    @ApiProperty({ example: 'river-walker', description: 'Name or nickname' })
    @IsString()
    @IsNotEmpty()
    author!: string;

    @ApiProperty({ example: 'Anyone driving up to Cedar Hollow on Friday?' })
    @IsString()
    @IsNotEmpty()
    content!: string;

    @ApiPropertyOptional({ example: 'rideshare', description: `Conventionally one of: ${MESSAGE_TOPICS.join(' | ')}` })
    @IsOptional()
    @IsString()
    topic?: string;
}
