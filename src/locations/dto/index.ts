export * from './create-location.dto';
export * from './list-locations-query.dto';
