/**
 * Host Operations
 *
 * Named entry points the host can apply, and the read-only queries it can
 * answer. Scripts arrive as untyped JSON; parseOperation / parseQuery turn
 * them into these unions or throw MalformedOperationError.
 */

import { AmendmentRecord, Identity, ItemRecord } from '../registry/registry-types';
import { RegistryResult } from '../registry/registry-errors';
import { JournalEntry } from '../event-store/journal-types';

export type RegistryOperation =
  | { name: 'setAuthority'; identity: Identity }
  | { name: 'setIssuerFee'; fee: number }
  | { name: 'setMaxItems'; maxItems: number }
  | { name: 'setDefaultLocation'; location: string }
  | {
      name: 'mint';
      metadata: string;
      itemType: string;
      expiry: number;
      serial: string;
      location: string;
      category: string;
    }
  | { name: 'update'; id: number; metadata: string; expiry: number; location: string }
  | { name: 'deactivate'; id: number };

export type OperationName = RegistryOperation['name'];

export type RegistryQuery =
  | { name: 'getItem'; id: number }
  | { name: 'getItemUpdates'; id: number }
  | { name: 'getItemsByType'; itemType: string }
  | { name: 'isItemRegistered'; serial: string }
  | { name: 'getItemCount' };

export type QueryAnswer = ItemRecord | AmendmentRecord | number[] | boolean | number | undefined;

export interface OperationReceipt {
  sequence: number;              // Position in the host's total order, from 1
  name: OperationName;
  caller: Identity;
  height: number;
  result: RegistryResult<number | boolean>;
  events: JournalEntry[];        // Journal entries written by this operation
}

export class MalformedOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedOperationError';
  }
}

// ============================================================================
// Parsing
// ============================================================================

type Fields = Record<string, unknown>;

const OPERATION_NAMES: readonly OperationName[] = [
  'setAuthority',
  'setIssuerFee',
  'setMaxItems',
  'setDefaultLocation',
  'mint',
  'update',
  'deactivate',
];

const QUERY_NAMES: readonly RegistryQuery['name'][] = [
  'getItem',
  'getItemUpdates',
  'getItemsByType',
  'isItemRegistered',
  'getItemCount',
];

function isOperationName(value: unknown): value is OperationName {
  return OPERATION_NAMES.some(name => name === value);
}

function isQueryName(value: unknown): value is RegistryQuery['name'] {
  return QUERY_NAMES.some(name => name === value);
}

function asFields(raw: unknown, what: string): Fields {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new MalformedOperationError(`${what} must be an object`);
  }
  return Object.fromEntries(Object.entries(raw));
}

function text(fields: Fields, key: string, op: string): string {
  const value = fields[key];
  if (typeof value !== 'string') {
    throw new MalformedOperationError(`${op}: "${key}" must be a string`);
  }
  return value;
}

/**
 * Numeric arguments are passed through as numbers; range checks belong to
 * the registry, which answers them with its own error kinds.
 */
function num(fields: Fields, key: string, op: string): number {
  const value = fields[key];
  if (typeof value !== 'number') {
    throw new MalformedOperationError(`${op}: "${key}" must be a number`);
  }
  return value;
}

export function parseOperation(raw: unknown): RegistryOperation {
  const fields = asFields(raw, 'Operation');
  const name = fields.name;
  if (!isOperationName(name)) {
    throw new MalformedOperationError(`Unknown operation: ${String(name)}`);
  }

  switch (name) {
    case 'setAuthority':
      return { name, identity: text(fields, 'identity', name) };
    case 'setIssuerFee':
      return { name, fee: num(fields, 'fee', name) };
    case 'setMaxItems':
      return { name, maxItems: num(fields, 'maxItems', name) };
    case 'setDefaultLocation':
      return { name, location: text(fields, 'location', name) };
    case 'mint':
      return {
        name,
        metadata: text(fields, 'metadata', name),
        itemType: text(fields, 'itemType', name),
        expiry: num(fields, 'expiry', name),
        serial: text(fields, 'serial', name),
        location: text(fields, 'location', name),
        category: text(fields, 'category', name),
      };
    case 'update':
      return {
        name,
        id: num(fields, 'id', name),
        metadata: text(fields, 'metadata', name),
        expiry: num(fields, 'expiry', name),
        location: text(fields, 'location', name),
      };
    case 'deactivate':
      return { name, id: num(fields, 'id', name) };
  }
}

export function parseQuery(raw: unknown): RegistryQuery {
  const fields = asFields(raw, 'Query');
  const name = fields.name;
  if (!isQueryName(name)) {
    throw new MalformedOperationError(`Unknown query: ${String(name)}`);
  }

  switch (name) {
    case 'getItem':
      return { name, id: num(fields, 'id', name) };
    case 'getItemUpdates':
      return { name, id: num(fields, 'id', name) };
    case 'getItemsByType':
      return { name, itemType: text(fields, 'itemType', name) };
    case 'isItemRegistered':
      return { name, serial: text(fields, 'serial', name) };
    case 'getItemCount':
      return { name };
  }
}
