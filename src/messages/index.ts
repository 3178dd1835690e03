/**
 * @fileoverview Messages Barrel Export
 */

export * from './messages.module';
export * from './messages.service';
export * from './dto';
export * from './interfaces';
