export * from './collection.service';
