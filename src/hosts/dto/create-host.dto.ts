/**
 * @fileoverview Create Host DTO
 */

import { IsArray, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Host } from '../interfaces';

export class CreateHostDto implements Host {
    @ApiProperty({ example: 'Amara Okafor', description: 'Host or facilitator name' })
    @IsString()
    @IsNotEmpty()
    name!: string;

    @ApiPropertyOptional({ example: 'Breathwork guide with ten years of silent retreats', description: 'Short bio' })
    @IsOptional()
    @IsString()
    bio?: string;

    @ApiPropertyOptional({ example: ['meditation', 'breathwork'], type: [String], default: [] })
    @IsArray()
    @IsString({ each: true })
    specialties: string[] = [];

    @ApiPropertyOptional({ example: 'https://example.org' })
    @IsOptional()
    @IsString()
    website?: string;

    @ApiPropertyOptional({ example: 'Sintra, Portugal', description: 'Primary base location of the host' })
    @IsOptional()
    @IsString()
    location?: string;
}
