import { CartLine, Product, TransactionEntry } from '../../domain/models.js';

export interface ICartRepository {
  loadCatalog(): Product[];
  saveCatalog(products: readonly Product[]): void;
  // lines for products missing from the catalog are dropped
  loadCart(catalog: ReadonlyMap<string, Product>): CartLine[];
  saveCart(lines: readonly CartLine[]): void;
  appendTransaction(entry: TransactionEntry): void;
}
