export * from './create-message.dto';
export * from './list-messages-query.dto';
