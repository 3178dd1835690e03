/**
 * @fileoverview Recommendations Barrel Export
 */

export * from './recommendations.module';
export * from './recommendations.service';
export * from './retreat-filter';
export * from './spirit-messages';
export * from './dto';
export * from './interfaces';
