/**
 * @fileoverview Guidance Messages
 *
 * Static text returned alongside recommendations, keyed by mood.
 */

export const ENERGIES = ['calm', 'transformative', 'adventurous', 'restorative'] as const;

export type Energy = (typeof ENERGIES)[number];

const SPIRIT_MESSAGES: ReadonlyMap<string, string> = new Map<Energy, string>([
    ['calm', 'The waters are still today; gentle breath and soft horizons call you.'],
    ['transformative', 'Winds of change swirl around you; trust the metamorphosis.'],
    ['adventurous', 'Peaks and tides await; your courage is the compass.'],
    ['restorative', 'Let the earth hold you; sleep, nourish, and renew.'],
]);

export const FALLBACK_SPIRIT_MESSAGE = 'Nature listens. Share more, and I’ll guide you further.';

export function isEnergy(value: string | null | undefined): value is Energy {
    return typeof value === 'string' && SPIRIT_MESSAGES.has(value);
}

/**
 * Exact, case-sensitive lookup; anything unrecognised gets the fallback.
 */
export function selectSpiritMessage(energy: string | null | undefined): string {
    if (!isEnergy(energy)) return FALLBACK_SPIRIT_MESSAGE;
    return SPIRIT_MESSAGES.get(energy) ?? FALLBACK_SPIRIT_MESSAGE;
}
