/**
 * @fileoverview Location Interface
 *
 * Sanctuary or place where retreats are held.
 */

/**
 * Conventional nature types. Stored values are free-form strings and are not
 * checked against this list.
 */
export const NATURE_TYPES = ['desert', 'forest', 'mountain', 'ocean', 'jungle', 'mixed'] as const;

export interface Location {
    title: string;

    /** Country or region */
    region: string;

    nature_type: string;
    description?: string;
    image_url?: string;
}

/**
 * Query parameters accepted by the location list endpoint.
 */
export interface LocationListQuery {
    nature_type?: string;
    region?: string;
}
