/**
 * Configuration for the cart ledger.
 * Loads file locations and logging settings from environment variables with defaults.
 */

import path from 'node:path';
import type { LevelWithSilent } from 'pino';

export interface Config {
  catalogFile: string;
  cartFile: string;
  transactionLogFile: string;
  logLevel: LevelWithSilent;
  seedSampleCatalog: boolean;
}

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some(level => level === value);
}

function parseFlag(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`Invalid ${name}: ${value}. Must be true or false.`);
  }
}

/**
 * Load and validate configuration. Explicit file variables win over DATA_DIR,
 * which only prefixes the default file names.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const dataDir = env.DATA_DIR || '.';
  const logLevel = (env.LOG_LEVEL || 'info').toLowerCase();

  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  return {
    catalogFile: env.CATALOG_FILE || path.join(dataDir, 'product_catalog.json'),
    cartFile: env.CART_FILE || path.join(dataDir, 'cart_state.json'),
    transactionLogFile: env.TRANSACTION_LOG_FILE || path.join(dataDir, 'transactions.csv'),
    logLevel,
    seedSampleCatalog: parseFlag('SEED_SAMPLE_CATALOG', env.SEED_SAMPLE_CATALOG, true),
  };
}
