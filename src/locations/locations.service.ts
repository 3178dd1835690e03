import { Injectable } from '@nestjs/common';
import { CollectionService } from '../shared/collections';
import { Result } from '../shared/result';
import { DocumentStore, StoreError, StoredDocument, equalityFilter } from '../shared/storage';
import { Location, LocationListQuery } from './interfaces';

@Injectable()
export class LocationsService extends CollectionService<Location> {
    constructor(store: DocumentStore) {
        super(store, 'location');
    }

    search(query: LocationListQuery): Promise<Result<StoredDocument[], StoreError>> {
        return this.list(equalityFilter({ nature_type: query.nature_type, region: query.region }));
    }
}
