import { Injectable } from '@nestjs/common';
import { CollectionService } from '../shared/collections';
import { Result } from '../shared/result';
import { DocumentStore, StoreError, StoredDocument, equalityFilter } from '../shared/storage';
import { Message, MessageListQuery } from './interfaces';

@Injectable()
export class MessagesService extends CollectionService<Message> {
    constructor(store: DocumentStore) {
        super(store, 'message');
    }

    search(query: MessageListQuery): Promise<Result<StoredDocument[], StoreError>> {
        return this.list(equalityFilter({ topic: query.topic }));
    }
}
