export * from './preference.dto';
