export * from './retreat.interface';
