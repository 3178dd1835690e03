/**
 * @fileoverview Host Interface
 */

/**
 * Host or facilitator running retreats. Retreats refer to a host by `name`.
 */
export interface Host {
    name: string;
    bio?: string;

    /** Modalities such as meditation, breathwork, yoga or sound */
    specialties: string[];

    website?: string;

    /** Primary base location of the host */
    location?: string;
}
