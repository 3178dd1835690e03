import { Injectable } from '@nestjs/common';
import { CollectionService } from '../shared/collections';
import { Result } from '../shared/result';
import { DocumentStore, StoreError, StoredDocument, equalityFilter } from '../shared/storage';
import { Retreat, RetreatListQuery } from './interfaces';

@Injectable()
export class RetreatsService extends CollectionService<Retreat> {
    constructor(store: DocumentStore) {
        super(store, 'retreat');
    }

    search(query: RetreatListQuery): Promise<Result<StoredDocument[], StoreError>> {
        return this.list(equalityFilter({ nature_type: query.nature_type }));
    }
}
