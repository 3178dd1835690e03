import { IsOptional, IsString } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { LocationListQuery } from '../interfaces';

export class ListLocationsQueryDto implements LocationListQuery {
    @ApiPropertyOptional({ example: 'forest', description: 'Exact nature type match' })
    @IsOptional()
    @IsString()
    nature_type?: string;

    @ApiPropertyOptional({ example: 'British Columbia, Canada', description: 'Exact region match' })
    @IsOptional()
    @IsString()
    region?: string;
}
