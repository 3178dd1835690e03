/**
 * @fileoverview Retreat Filter Builder
 *
 * Turns preference answers into conditions on the retreat collection.
 */

import { DocumentFilter, FilterCondition, eq, lte } from '../shared/storage';
import { QuizInput } from './interfaces';

/** Number of retreats returned by a recommendation */
export const RECOMMENDATION_LIMIT = 8;

/**
 * Builds the retreat filter for a set of preferences.
 *
 * @remarks
 * Numeric fields are checked for presence rather than truthiness: a budget
 * of 0 limits matches to free retreats, and a duration of 0 is kept as a
 * `duration_days <= 0` ceiling (it matches nothing) rather than read as "no
 * preference". Absent fields add no condition and `goals` is never read.
 */
export function buildRetreatFilter(input: QuizInput): DocumentFilter {
    const filter: Record<string, FilterCondition> = {};

    if (input.preferred_nature) {
        filter.nature_type = eq(input.preferred_nature);
    }
    if (input.duration !== undefined && input.duration !== null) {
        filter.duration_days = lte(input.duration);
    }
    if (input.budget !== undefined && input.budget !== null) {
        filter.price_usd = lte(input.budget);
    }

    return filter;
}
