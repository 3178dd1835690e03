/**
 * @fileoverview Community Message Interface
 */

/** Conventional topics; any string is accepted. */
export const MESSAGE_TOPICS = ['general', 'requests', 'offerings', 'rideshare', 'Q&A'] as const;

export interface Message {
    /** Name or nickname */
    author: string;
    content: string;
    topic?: string;
}

export interface MessageListQuery {
    topic?: string;
}
