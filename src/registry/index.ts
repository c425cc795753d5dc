/**
 * Registry Module
 *
 * Configuration, validation, items and amendments of the item issuer.
 */

export * from './registry-types';
export * from './registry-errors';
export * from './config-store';
export * from './item-validator';
export * from './amendment-log';
export * from './item-registry';
