/**
 * @fileoverview Hosts Barrel Export
 */

export * from './hosts.module';
export * from './hosts.service';
export * from './dto';
export * from './interfaces';
