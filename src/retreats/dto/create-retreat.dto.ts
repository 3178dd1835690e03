/**
 * @fileoverview Create Retreat DTO
 *
 * `duration_days` and `price_usd` are the only range-checked fields.
 */

import { IsArray, IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Max, Min } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { NATURE_TYPES } from '../../locations/interfaces';
import { MAX_DURATION_DAYS, MIN_DURATION_DAYS, Retreat } from '../interfaces';

export class CreateRetreatDto implements Retreat {
    @ApiProperty({ example: 'Seven Days of Forest Silence' })
    @IsString()
    @IsNotEmpty()
    title!: string;

    @ApiPropertyOptional()
    @IsOptional()
    @IsString()
    description?: string;

    @ApiProperty({ example: 'Amara Okafor', description: 'Name of the host facilitating' })
    @IsString()
    @IsNotEmpty()
    host_name!: string;

    @ApiProperty({ example: 'Cedar Hollow Sanctuary', description: 'Title of the location' })
    @IsString()
    @IsNotEmpty()
    location_title!: string;

    @ApiProperty({ example: 'forest', description: `Conventionally one of: ${NATURE_TYPES.join(' | ')}` })
    @IsString()
    @IsNotEmpty()
    nature_type!: string;

    @ApiPropertyOptional({ example: ['meditation', 'silence'], type: [String], default: [] })
    @IsArray()
    @IsString({ each: true })
    focus: string[] = [];

    @ApiProperty({ example: 7, minimum: MIN_DURATION_DAYS, maximum: MAX_DURATION_DAYS })
    @IsInt()
    @Min(MIN_DURATION_DAYS)
    @Max(MAX_DURATION_DAYS)
    duration_days!: number;

    @ApiProperty({ example: 1200, minimum: 0 })
    @IsNumber({ allowNaN: false, allowInfinity: false })
    @Min(0)
    price_usd!: number;

    @ApiPropertyOptional({ example: '2025-06-01', description: 'ISO date string' })
    @IsOptional()
    @IsString()
    start_date?: string;

    @ApiPropertyOptional()
    @IsOptional()
    @IsString()
    image_url?: string;
}
