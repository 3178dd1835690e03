export * from './location.interface';
