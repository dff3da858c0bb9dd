#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { ShoppingMenu } from './cli/ShoppingMenu.js';
import { createLinePrompt } from './cli/prompt.js';
import { InventoryLedger } from './domain/services/InventoryLedger.js';
import { JsonFileCartRepository } from './infrastructure/stores/JsonFileCartRepository.js';
import { Config, loadConfig } from './utils/config.js';
import { Logger, createLogger } from './utils/logger.js';

export { InventoryLedger } from './domain/services/InventoryLedger.js';
export { DomainError, InventoryError, ValidationError } from './domain/errors/index.js';
export { JsonFileCartRepository } from './infrastructure/stores/JsonFileCartRepository.js';
export { InMemoryCartRepository } from './infrastructure/stores/InMemoryCartRepository.js';
export { SAMPLE_CATALOG } from './domain/sampleCatalog.js';
export type { ICartRepository } from './infrastructure/stores/ICartRepository.js';
export type {
  CartLine,
  CheckoutResult,
  DigitalProduct,
  GenericProduct,
  PhysicalProduct,
  Product,
  ProductType,
  TransactionAction,
  TransactionEntry,
} from './domain/models.js';

// wiring
export function buildLedger(config: Config, logger: Logger): InventoryLedger {
  const repository = new JsonFileCartRepository(
    {
      catalogFile: config.catalogFile,
      cartFile: config.cartFile,
      transactionLogFile: config.transactionLogFile,
    },
    logger
  );
  const ledger = new InventoryLedger(repository, { logger });

  if (config.seedSampleCatalog) {
    ledger.initializeSampleCatalog();
  }
  return ledger;
}

async function start(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const prompt = createLinePrompt(process.stdin, process.stdout);

  try {
    logger.info(
      {
        catalogFile: config.catalogFile,
        cartFile: config.cartFile,
        transactionLogFile: config.transactionLogFile,
      },
      'Starting cart session'
    );
    const ledger = buildLedger(config, logger);
    await new ShoppingMenu(ledger, prompt, process.stdout).run();
  } catch (err) {
    logger.fatal({ err }, 'Cart session failed');
    process.exitCode = 1;
  } finally {
    prompt.close();
  }
}

// Start if run directly (argv[1] may be the bin symlink)
if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  start().catch((err: unknown) => {
    console.error('Failed to start:', err);
    process.exit(1);
  });
}
