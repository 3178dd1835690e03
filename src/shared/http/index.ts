export * from './store-error.mapper';
export * from './validation.pipe';
