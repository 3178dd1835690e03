export * from './preference.interface';
