import { IsOptional, IsString } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { RetreatListQuery } from '../interfaces';

export class ListRetreatsQueryDto implements RetreatListQuery {
    @ApiPropertyOptional({ example: 'forest', description: 'Exact, case-sensitive nature type match' })
    @IsOptional()
    @IsString()
    nature_type?: string;
}
