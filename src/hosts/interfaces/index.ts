export * from './host.interface';
