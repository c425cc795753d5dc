/**
 * Item Validator
 *
 * Field predicates for mint and update. Each check is pure and independent;
 * the pipelines run them in a fixed order and stop at the first failure, so
 * the order decides which error the caller sees.
 */

import { ConfigStore, isValidLocation } from './config-store';
import { ItemType, MintRequest, UpdateRequest, isItemType } from './registry-types';
import { RegistryFailure, failure, isUint } from './registry-errors';

export const MAX_METADATA_LENGTH = 100;
export const MAX_SERIAL_LENGTH = 50;
export const MAX_CATEGORY_LENGTH = 30;

export type ValidationResult = { valid: true } | { valid: false; failure: RegistryFailure };

/** A passing mint also yields the narrowed item type. */
export type MintValidation = { valid: true; itemType: ItemType } | { valid: false; failure: RegistryFailure };

export type FieldRule = () => ValidationResult;

const VALID: ValidationResult = { valid: true };

function invalid(result: RegistryFailure): { valid: false; failure: RegistryFailure } {
  return { valid: false, failure: result };
}

function unknownItemType(itemType: string): RegistryFailure {
  return failure('InvalidItemType', `Unknown item type: "${itemType}"`);
}

function hasLength(value: string, min: number, max: number): boolean {
  return value.length >= min && value.length <= max;
}

export class ItemValidator {
  constructor(private config: ConfigStore) {}

  checkMetadata(metadata: string): ValidationResult {
    if (!hasLength(metadata, 1, MAX_METADATA_LENGTH)) {
      return invalid(failure('InvalidMetadata', `Metadata must be 1-${MAX_METADATA_LENGTH} characters`));
    }
    return VALID;
  }

  checkItemType(itemType: string): ValidationResult {
    if (!isItemType(itemType)) {
      return invalid(unknownItemType(itemType));
    }
    return VALID;
  }

  /**
   * Expiry is compared with the height of the operation being validated,
   * so an update re-checks against the height at update time.
   */
  checkExpiry(expiry: number, height: number): ValidationResult {
    if (!isUint(expiry)) {
      return invalid(failure('InvalidExpiry', `Expiry must be a non-negative integer, got ${expiry}`));
    }
    if (expiry < height) {
      return invalid(failure('ExpiryPast', `Expiry ${expiry} is before current height ${height}`));
    }
    return VALID;
  }

  checkSerial(serial: string): ValidationResult {
    if (!hasLength(serial, 1, MAX_SERIAL_LENGTH)) {
      return invalid(failure('InvalidSerial', `Serial must be 1-${MAX_SERIAL_LENGTH} characters`));
    }
    return VALID;
  }

  checkLocation(location: string): ValidationResult {
    if (!isValidLocation(location, this.config.defaultLocation)) {
      return invalid(failure('InvalidLocation', `Invalid location: "${location}"`));
    }
    return VALID;
  }

  checkCategory(category: string): ValidationResult {
    if (!hasLength(category, 1, MAX_CATEGORY_LENGTH)) {
      return invalid(failure('InvalidCategory', `Category must be 1-${MAX_CATEGORY_LENGTH} characters`));
    }
    return VALID;
  }

  /**
   * Field checks of a mint: metadata, item type, expiry, serial, location,
   * category. Capacity, uniqueness and authority are the registry's.
   */
  validateMint(request: MintRequest, height: number): MintValidation {
    const metadata = this.checkMetadata(request.metadata);
    if (!metadata.valid) return metadata;

    const { itemType } = request;
    if (!isItemType(itemType)) {
      return invalid(unknownItemType(itemType));
    }

    const rest = this.firstFailure([
      () => this.checkExpiry(request.expiry, height),
      () => this.checkSerial(request.serial),
      () => this.checkLocation(request.location),
      () => this.checkCategory(request.category),
    ]);
    if (!rest.valid) return rest;

    return { valid: true, itemType };
  }

  validateUpdate(request: UpdateRequest, height: number): ValidationResult {
    return this.firstFailure([
      () => this.checkMetadata(request.metadata),
      () => this.checkExpiry(request.expiry, height),
      () => this.checkLocation(request.location),
    ]);
  }

  private firstFailure(rules: FieldRule[]): ValidationResult {
    for (const rule of rules) {
      const result = rule();
      if (!result.valid) return result;
    }
    return VALID;
  }
}
