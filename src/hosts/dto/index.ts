export * from './create-host.dto';
