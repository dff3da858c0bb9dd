import { CartLine, Product, TransactionEntry } from '../../domain/models.js';
import { Logger, createSilentLogger } from '../../utils/logger.js';
import { ICartRepository } from './ICartRepository.js';
import {
  CartLineRecord,
  ProductRecord,
  parseCatalogRecords,
  resolveCartRecords,
  toCartLineRecord,
  toProductRecord,
} from './records.js';

// keeps serialized copies, so loads never hand back objects a caller still holds
export class InMemoryCartRepository implements ICartRepository {
  private catalogRecords: unknown[];
  private cartRecords: unknown[];
  private transactions: TransactionEntry[] = [];
  private catalogSaves = 0;
  private cartSaves = 0;
  private readonly logger: Logger;

  constructor(seed?: { catalog?: unknown[]; cart?: unknown[] }, logger?: Logger) {
    this.catalogRecords = structuredClone(seed?.catalog ?? []);
    this.cartRecords = structuredClone(seed?.cart ?? []);
    this.logger = logger ?? createSilentLogger();
  }

  loadCatalog(): Product[] {
    return parseCatalogRecords(structuredClone(this.catalogRecords), (index, message) => {
      this.logger.warn({ index, reason: message }, 'Skipping unreadable product record');
    });
  }

  saveCatalog(products: readonly Product[]): void {
    this.catalogRecords = products.map(toProductRecord);
    this.catalogSaves++;
  }

  loadCart(catalog: ReadonlyMap<string, Product>): CartLine[] {
    return resolveCartRecords(structuredClone(this.cartRecords), catalog, (index, message) => {
      this.logger.warn({ index, reason: message }, 'Skipping unreadable cart record');
    });
  }

  saveCart(lines: readonly CartLine[]): void {
    this.cartRecords = lines.map(toCartLineRecord);
    this.cartSaves++;
  }

  appendTransaction(entry: TransactionEntry): void {
    this.transactions.push({ ...entry });
  }

  // Utility methods for testing
  getTransactions(): readonly TransactionEntry[] {
    return this.transactions;
  }

  getSaveCounts(): { catalog: number; cart: number } {
    return { catalog: this.catalogSaves, cart: this.cartSaves };
  }

  getCatalogRecords(): ProductRecord[] {
    return this.catalogRecords.filter(isProductRecord);
  }

  getCartRecords(): CartLineRecord[] {
    return this.cartRecords.filter(isCartLineRecord);
  }
}

function isProductRecord(record: unknown): record is ProductRecord {
  return typeof record === 'object' && record !== null && 'product_id' in record && 'quantity_available' in record;
}

function isCartLineRecord(record: unknown): record is CartLineRecord {
  return typeof record === 'object' && record !== null && 'product_id' in record && 'quantity' in record;
}
