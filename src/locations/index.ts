/**
 * @fileoverview Locations Barrel Export
 */

export * from './locations.module';
export * from './locations.service';
export * from './dto';
export * from './interfaces';
