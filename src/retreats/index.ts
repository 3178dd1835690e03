/**
 * @fileoverview Retreats Barrel Export
 */

export * from './retreats.module';
export * from './retreats.service';
export * from './dto';
export * from './interfaces';
