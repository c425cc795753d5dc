/**
 * Configuration Store
 *
 * Global registry parameters. The authority is set once (bootstrap); every
 * other setter requires it. Setters take effect for subsequent operations
 * only and keep no history.
 */

import { Identity, RegistryParameters } from './registry-types';
import { RegistryResult, ok, fail, isUint } from './registry-errors';

export const DEFAULT_MAX_ITEMS = 5000;
export const DEFAULT_ISSUER_FEE = 500;
export const DEFAULT_LOCATION = 'Global';

export const MAX_LOCATION_LENGTH = 50;

export function defaultParameters(): RegistryParameters {
  return {
    nextItemId: 0,
    maxItems: DEFAULT_MAX_ITEMS,
    issuerFee: DEFAULT_ISSUER_FEE,
    authority: null,
    defaultLocation: DEFAULT_LOCATION,
  };
}

/**
 * Location rule shared with the validation pipeline: the current default is
 * always accepted, anything else needs 1-50 characters.
 */
export function isValidLocation(location: string, defaultLocation: string): boolean {
  return location === defaultLocation || (location.length > 0 && location.length <= MAX_LOCATION_LENGTH);
}

/**
 * First rule a parameter set breaks, or null when it is usable.
 */
export function describeInvalidParameters(params: RegistryParameters): string | null {
  if (!isUint(params.nextItemId)) {
    return `nextItemId must be a non-negative integer, got ${params.nextItemId}`;
  }
  if (!isUint(params.maxItems) || params.maxItems === 0) {
    return `maxItems must be a positive integer, got ${params.maxItems}`;
  }
  if (!isUint(params.issuerFee)) {
    return `issuerFee must be a non-negative integer, got ${params.issuerFee}`;
  }
  if (params.authority !== null && params.authority.length === 0) {
    return 'authority must be a non-empty identity or null';
  }
  if (params.defaultLocation.length === 0 || params.defaultLocation.length > MAX_LOCATION_LENGTH) {
    return `defaultLocation must be 1-${MAX_LOCATION_LENGTH} characters, got "${params.defaultLocation}"`;
  }
  return null;
}

export class ConfigStore {
  private params: RegistryParameters;

  /**
   * Fields left out (or undefined) take their defaults; the rest must pass
   * the same rules the setters apply, or construction throws RangeError.
   */
  constructor(initial: Partial<RegistryParameters> = {}) {
    const defaults = defaultParameters();
    this.params = {
      nextItemId: initial.nextItemId ?? defaults.nextItemId,
      maxItems: initial.maxItems ?? defaults.maxItems,
      issuerFee: initial.issuerFee ?? defaults.issuerFee,
      authority: initial.authority ?? defaults.authority,
      defaultLocation: initial.defaultLocation ?? defaults.defaultLocation,
    };

    const problem = describeInvalidParameters(this.params);
    if (problem) {
      throw new RangeError(`Invalid registry parameters: ${problem}`);
    }
  }

  get nextItemId(): number {
    return this.params.nextItemId;
  }

  get maxItems(): number {
    return this.params.maxItems;
  }

  get issuerFee(): number {
    return this.params.issuerFee;
  }

  get authority(): Identity | null {
    return this.params.authority;
  }

  get defaultLocation(): string {
    return this.params.defaultLocation;
  }

  snapshot(): RegistryParameters {
    return { ...this.params };
  }

  setAuthority(identity: Identity): RegistryResult<true> {
    if (this.params.authority !== null) {
      return fail('AuthorityAlreadySet', `Authority already set to ${this.params.authority}`);
    }
    this.params.authority = identity;
    return ok(true);
  }

  setIssuerFee(fee: number): RegistryResult<true> {
    if (this.params.authority === null) {
      return fail('AuthorityNotSet', 'Authority must be set before changing the issuer fee');
    }
    if (!isUint(fee)) {
      return fail('InvalidIssuerFee', `Issuer fee must be a non-negative integer, got ${fee}`);
    }
    this.params.issuerFee = fee;
    return ok(true);
  }

  setMaxItems(maxItems: number): RegistryResult<true> {
    if (this.params.authority === null) {
      return fail('AuthorityNotSet', 'Authority must be set before changing max items');
    }
    if (!isUint(maxItems) || maxItems === 0) {
      return fail('InvalidUpdate', `Max items must be a positive integer, got ${maxItems}`);
    }
    this.params.maxItems = maxItems;
    return ok(true);
  }

  setDefaultLocation(location: string): RegistryResult<true> {
    if (this.params.authority === null) {
      return fail('AuthorityNotSet', 'Authority must be set before changing the default location');
    }
    if (!isValidLocation(location, this.params.defaultLocation)) {
      return fail('InvalidLocation', `Invalid default location: "${location}"`);
    }
    this.params.defaultLocation = location;
    return ok(true);
  }

  /**
   * Hand out the next item id. Only the registry calls this, after every
   * mint check and the fee transfer have passed.
   */
  allocateItemId(): number {
    const id = this.params.nextItemId;
    this.params.nextItemId = id + 1;
    return id;
  }
}
