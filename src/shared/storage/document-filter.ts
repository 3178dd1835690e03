/**
 * @fileoverview Document Filters
 *
 * Every collection declares which fields can be filtered and with which
 * comparison. Filters are checked against that declaration before they are
 * translated into a MongoDB query.
 */

import type { Filter, Document } from 'mongodb';
import { Result, ok, err } from '../result';
import { StoreError } from './storage-errors';

export const COLLECTIONS = ['host', 'location', 'retreat', 'message'] as const;

export type CollectionName = (typeof COLLECTIONS)[number];

export type FilterOperator = 'eq' | 'lte';

export type FilterValue = string | number | boolean;

export type FilterCondition =
    | { op: 'eq'; value: FilterValue }
    | { op: 'lte'; value: number };

export type DocumentFilter = Readonly<Record<string, FilterCondition>>;

export const FILTERABLE_FIELDS: Readonly<Record<CollectionName, Readonly<Record<string, readonly FilterOperator[]>>>> = {
    host: {},
    location: {
        nature_type: ['eq'],
        region: ['eq'],
    },
    retreat: {
        nature_type: ['eq'],
        duration_days: ['lte'],
        price_usd: ['lte'],
    },
    message: {
        topic: ['eq'],
    },
};

export const eq = (value: FilterValue): FilterCondition => ({ op: 'eq', value });

export const lte = (value: number): FilterCondition => ({ op: 'lte', value });

/**
 * Builds equality conditions from optional query values. Missing and empty
 * values impose no constraint.
 */
export function equalityFilter(values: Readonly<Record<string, string | undefined>>): DocumentFilter {
    const filter: Record<string, FilterCondition> = {};
    for (const [field, value] of Object.entries(values)) {
        if (value) filter[field] = eq(value);
    }
    return filter;
}

/**
 * Rejects filters that name undeclared fields, or declared fields with an
 * operator the collection does not allow.
 */
export function checkFilter(collection: CollectionName, filter: DocumentFilter): Result<DocumentFilter, StoreError> {
    const allowed = FILTERABLE_FIELDS[collection];
    const rejected = Object.entries(filter)
        .filter(([field, condition]) => {
            const operators = Object.prototype.hasOwnProperty.call(allowed, field) ? allowed[field] : [];
            return !operators.includes(condition.op);
        })
        .map(([field, condition]) => `${field}:${condition.op}`);

    if (rejected.length > 0) {
        return err({
            kind: 'invalid_filter',
            collection,
            message: `Unsupported filter for ${collection}: ${rejected.join(', ')}`,
            fields: rejected,
        });
    }

    return ok(filter);
}

export function toMongoFilter(filter: DocumentFilter): Filter<Document> {
    const query: Filter<Document> = {};
    for (const [field, condition] of Object.entries(filter)) {
        query[field] = condition.op === 'eq' ? condition.value : { $lte: condition.value };
    }
    return query;
}
