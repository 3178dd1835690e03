/**
 * @fileoverview Recommendations Controller
 */

import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { unwrapOrThrow } from '../shared/http';
import { PreferenceDto } from './dto';
import { Recommendation } from './interfaces';
import { RecommendationsService } from './recommendations.service';

@ApiTags('recommendations')
@Controller('api')
export class RecommendationsController {
    constructor(private recommendationsService: RecommendationsService) { }

    /**
     * Up to eight retreats matching the preferences, with a guidance message.
     */
    @Post('recommend')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Recommend retreats', description: 'Rule-based matching on nature type, duration and budget' })
    @ApiBody({ type: PreferenceDto })
    async recommend(@Body() preference: PreferenceDto): Promise<Recommendation> {
        return unwrapOrThrow(await this.recommendationsService.recommend(preference));
    }

    @Post('quiz')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Submit quiz answers', description: 'Same response as /api/recommend' })
    @ApiBody({ type: PreferenceDto })
    async quiz(@Body() preference: PreferenceDto): Promise<Recommendation> {
        return unwrapOrThrow(await this.recommendationsService.quiz(preference));
    }
}
