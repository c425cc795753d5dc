/**
 * Registry failure taxonomy.
 *
 * Every fallible entry point returns a tagged result instead of throwing.
 * Codes 1000-1013 are the registry's published error constants; 1014 and
 * 1015 cover a repeated bootstrap and a refused fee transfer.
 */

export const REGISTRY_ERROR_CODES = {
  Unauthorized: 1000,
  InvalidMetadata: 1001,
  InvalidItemType: 1002,
  InvalidExpiry: 1003,
  InvalidIssuerFee: 1004,
  ItemAlreadyExists: 1005,
  MaxItemsExceeded: 1006,
  AuthorityNotSet: 1007,
  InvalidLocation: 1008,
  InvalidCategory: 1009,
  InvalidSerial: 1010,
  ExpiryPast: 1011,
  UpdateNotAllowed: 1012,
  InvalidUpdate: 1013,
  AuthorityAlreadySet: 1014,
  TransferFailed: 1015,
} as const;

export type RegistryErrorKind = keyof typeof REGISTRY_ERROR_CODES;

export interface RegistryFailure {
  kind: RegistryErrorKind;
  code: number;
  message: string;
}

export type RegistryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RegistryFailure };

export function ok<T>(value: T): RegistryResult<T> {
  return { ok: true, value };
}

export function failure(kind: RegistryErrorKind, message: string): RegistryFailure {
  return { kind, code: REGISTRY_ERROR_CODES[kind], message };
}

export function fail<T>(kind: RegistryErrorKind, message: string): RegistryResult<T> {
  return { ok: false, error: failure(kind, message) };
}

export function isUint(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}
