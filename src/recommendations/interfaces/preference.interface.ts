/**
 * @fileoverview Preference Interfaces
 *
 * Transient inputs of the recommendation engine; never persisted.
 */

import { StoredDocument } from '../../shared/storage';

/**
 * Fields read by the retreat filter and the guidance lookup. `null` is
 * treated the same as an absent field.
 */
export interface QuizInput {
    /** Mood label: calm | transformative | adventurous | restorative */
    energy?: string | null;

    /** Exact nature type the retreat must have */
    preferred_nature?: string | null;

    /** Maximum price in USD. Zero is a real budget. */
    budget?: number | null;

    /** Maximum retreat length in days */
    duration?: number | null;

    /** Free text. Accepted but not used by the filter. */
    goals?: string | null;
}

/**
 * Answers submitted through the quiz. Same fields as {@link QuizInput}.
 */
export type Preference = QuizInput;

export interface Recommendation {
    matches: StoredDocument[];
    spirit_message: string;
}
