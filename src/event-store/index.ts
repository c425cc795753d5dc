/**
 * Event Store Module
 *
 * Exports the hash-chained event journal the registry host records into.
 */

export * from './journal-types';
export * from './event-journal';
