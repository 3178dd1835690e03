/**
 * @fileoverview Preference DTO
 *
 * Body of both the recommend and the quiz endpoints.
 */

import { IsInt, IsNumber, IsOptional, IsString } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { NATURE_TYPES } from '../../locations/interfaces';
import { ENERGIES } from '../spirit-messages';
import { Preference } from '../interfaces';

export class PreferenceDto implements Preference {
    @ApiPropertyOptional({ example: 'calm', description: ENERGIES.join(' | ') })
    @IsOptional()
    @IsString()
    energy?: string | null;

    @ApiPropertyOptional({ example: 'forest', description: NATURE_TYPES.join(' | ') })
    @IsOptional()
    @IsString()
    preferred_nature?: string | null;

    @ApiPropertyOptional({ example: 800, description: 'Approximate budget in USD' })
    @IsOptional()
    @IsNumber({ allowNaN: false, allowInfinity: false })
    budget?: number | null;

    @ApiPropertyOptional({ example: 7, description: 'Preferred number of days' })
    @IsOptional()
    @IsInt()
    duration?: number | null;

    @ApiPropertyOptional({ example: 'release stress, sleep better', description: 'Free text' })
    @IsOptional()
    @IsString()
    goals?: string | null;
}
