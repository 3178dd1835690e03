/**
 * @fileoverview Retreat Interface
 */

export const MIN_DURATION_DAYS = 1;
export const MAX_DURATION_DAYS = 60;

/**
 * A retreat offered by a host at a location. Host and location are referenced
 * by name and title; neither reference is checked.
 */
export interface Retreat {
    title: string;
    description?: string;
    host_name: string;
    location_title: string;
    nature_type: string;

    /** e.g. meditation, detox, silence, ayurvedic, eco-building */
    focus: string[];

    /** Whole days, between 1 and 60 inclusive */
    duration_days: number;

    /** Non-negative price in USD */
    price_usd: number;

    /** ISO date string */
    start_date?: string;

    image_url?: string;
}

export interface RetreatListQuery {
    nature_type?: string;
}
