import { Injectable } from '@nestjs/common';
import { CollectionService } from '../shared/collections';
import { DocumentStore } from '../shared/storage';
import { Host } from './interfaces';

@Injectable()
export class HostsService extends CollectionService<Host> {
    constructor(store: DocumentStore) {
        super(store, 'host');
    }
}
