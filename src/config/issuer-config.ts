/**
 * Issuer configuration from the environment (.env is loaded by the entry
 * point through dotenv before this runs).
 */

import { LogLevel, parseLogLevel } from '../logging/structured-logger';
import { DEFAULT_ISSUER_FEE, DEFAULT_LOCATION, DEFAULT_MAX_ITEMS, MAX_LOCATION_LENGTH } from '../registry/config-store';

export interface IssuerConfig {
  dataDir: string | null;
  logLevel: LogLevel;
  maxItems: number;
  issuerFee: number;
  defaultLocation: string;
  startHeight: number;
}

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

function readInteger(env: NodeJS.ProcessEnv, variable: string, fallback: number, min: number): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw.trim());
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(variable, `expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function loadIssuerConfig(env: NodeJS.ProcessEnv = process.env): IssuerConfig {
  const rawLevel = env.ITEM_ISSUER_LOG_LEVEL;
  const logLevel = rawLevel === undefined ? LogLevel.INFO : parseLogLevel(rawLevel);
  if (logLevel === undefined) {
    throw new ConfigError('ITEM_ISSUER_LOG_LEVEL', `unknown level "${rawLevel}"`);
  }

  const defaultLocation = env.ITEM_ISSUER_DEFAULT_LOCATION ?? DEFAULT_LOCATION;
  if (defaultLocation.length === 0 || defaultLocation.length > MAX_LOCATION_LENGTH) {
    throw new ConfigError('ITEM_ISSUER_DEFAULT_LOCATION', `must be 1-${MAX_LOCATION_LENGTH} characters`);
  }

  const dataDir = env.ITEM_ISSUER_DATA_DIR?.trim();

  return {
    dataDir: dataDir ? dataDir : null,
    logLevel,
    maxItems: readInteger(env, 'ITEM_ISSUER_MAX_ITEMS', DEFAULT_MAX_ITEMS, 1),
    issuerFee: readInteger(env, 'ITEM_ISSUER_FEE', DEFAULT_ISSUER_FEE, 0),
    defaultLocation,
    startHeight: readInteger(env, 'ITEM_ISSUER_START_HEIGHT', 0, 0),
  };
}
