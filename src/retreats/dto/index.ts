export * from './create-retreat.dto';
export * from './list-retreats-query.dto';
