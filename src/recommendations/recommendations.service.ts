/**
 * @fileoverview Recommendations Service
 *
 * Rule-based retreat matching: a filter built from preferences plus a static
 * guidance message. No scoring or ranking; matches come back in store order.
 */

import { Injectable, Logger } from '@nestjs/common';
import { Counter } from 'prom-client';
import { Result, ok } from '../shared/result';
import { StoreError } from '../shared/storage';
import { RetreatsService } from '../retreats/retreats.service';
import { Preference, QuizInput, Recommendation } from './interfaces';
import { RECOMMENDATION_LIMIT, buildRetreatFilter } from './retreat-filter';
import { isEnergy, selectSpiritMessage } from './spirit-messages';

const recommendationCounter = new Counter({
    name: 'sanctuary_recommendations_total',
    help: 'Total number of recommendation requests',
    labelNames: ['energy', 'status'],
});

@Injectable()
export class RecommendationsService {
    private readonly logger = new Logger(RecommendationsService.name);

    constructor(private retreatsService: RetreatsService) { }

    async recommend(input: QuizInput): Promise<Result<Recommendation, StoreError>> {
        const energy = isEnergy(input.energy) ? input.energy : 'other';
        const filter = buildRetreatFilter(input);

        const matches = await this.retreatsService.list(filter, RECOMMENDATION_LIMIT);
        if (!matches.ok) {
            recommendationCounter.inc({ energy, status: 'error' });
            return matches;
        }

        recommendationCounter.inc({ energy, status: 'success' });
        this.logger.log({ msg: 'Recommendation built', energy, filter, matchCount: matches.value.length });

        return ok({
            matches: matches.value,
            spirit_message: selectSpiritMessage(input.energy),
        });
    }

    /**
     * Quiz answers go through the same matching as {@link recommend}.
     */
    quiz(preference: Preference): Promise<Result<Recommendation, StoreError>> {
        const { energy, preferred_nature, budget, duration, goals } = preference;
        return this.recommend({ energy, preferred_nature, budget, duration, goals });
    }
}
