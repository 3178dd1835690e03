/**
 * @fileoverview Create Location DTO
 */

import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Location, NATURE_TYPES } from '../interfaces';

export class CreateLocationDto implements Location {
    @ApiProperty({ example: 'Cedar Hollow Sanctuary', description: 'Sanctuary name or place title' })
    @IsString()
    @IsNotEmpty()
    title!: string;

    @ApiProperty({ example: 'British Columbia, Canada', description: 'Country or region' })
    @IsString()
    @IsNotEmpty()
    region!: string;

    @ApiProperty({ example: 'forest', description: `Conventionally one of: ${NATURE_TYPES.join(' | ')}` })
    @IsString()
    @IsNotEmpty()
    nature_type!: string;

    @ApiPropertyOptional()
    @IsOptional()
    @IsString()
    description?: string;

    @ApiPropertyOptional({ example: 'https://example.org/cedar-hollow.jpg' })
    @IsOptional()
    @IsString()
    image_url?: string;
}
