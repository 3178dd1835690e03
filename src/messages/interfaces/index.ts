export * from './message.interface';
