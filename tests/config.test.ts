import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { loadConfig } from '../src/utils/config.js';

describe('loadConfig', () => {
  it('uses default file names in the working directory', () => {
    expect(loadConfig({})).toEqual({
      catalogFile: 'product_catalog.json',
      cartFile: 'cart_state.json',
      transactionLogFile: 'transactions.csv',
      logLevel: 'info',
      seedSampleCatalog: true,
    });
  });

  it('prefixes default names with DATA_DIR', () => {
    const config = loadConfig({ DATA_DIR: path.join('var', 'bazaar') });

    expect(config.catalogFile).toBe(path.join('var', 'bazaar', 'product_catalog.json'));
    expect(config.cartFile).toBe(path.join('var', 'bazaar', 'cart_state.json'));
    expect(config.transactionLogFile).toBe(path.join('var', 'bazaar', 'transactions.csv'));
  });

  it('prefers explicit file variables over DATA_DIR', () => {
    const config = loadConfig({
      DATA_DIR: 'data',
      CATALOG_FILE: 'catalog.json',
      CART_FILE: 'cart.json',
      TRANSACTION_LOG_FILE: 'audit.csv',
    });

    expect(config.catalogFile).toBe('catalog.json');
    expect(config.cartFile).toBe('cart.json');
    expect(config.transactionLogFile).toBe('audit.csv');
  });

  it('normalizes the log level', () => {
    expect(loadConfig({ LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(loadConfig({ LOG_LEVEL: 'silent' }).logLevel).toBe('silent');
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow('Invalid LOG_LEVEL: verbose');
  });

  it('parses the seeding flag', () => {
    expect(loadConfig({ SEED_SAMPLE_CATALOG: 'false' }).seedSampleCatalog).toBe(false);
    expect(loadConfig({ SEED_SAMPLE_CATALOG: '0' }).seedSampleCatalog).toBe(false);
    expect(loadConfig({ SEED_SAMPLE_CATALOG: 'YES' }).seedSampleCatalog).toBe(true);
    expect(() => loadConfig({ SEED_SAMPLE_CATALOG: 'maybe' })).toThrow('Invalid SEED_SAMPLE_CATALOG: maybe');
  });
});
