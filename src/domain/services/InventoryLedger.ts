import { CartLine, CheckoutResult, Product, TransactionEntry } from '../models.js';
import { InventoryError } from '../errors/index.js';
import { decreaseAvailable, increaseAvailable, setQuantity, subtotal } from '../product.js';
import { SAMPLE_CATALOG } from '../sampleCatalog.js';
import { ICartRepository } from '../../infrastructure/stores/ICartRepository.js';
import { Logger, createSilentLogger } from '../../utils/logger.js';

/**
 * Moves stock between the catalog ("available") and the cart ("reserved").
 *
 * For every product, available + reserved stays equal to the stock loaded
 * for it; checkout is the only operation that takes units out of the system.
 * Invalid input returns false, a shortfall throws InventoryError, and every
 * successful mutation rewrites both stores and appends one transaction.
 */
export class InventoryLedger {
  private catalog = new Map<string, Product>();
  private lines = new Map<string, CartLine>();
  private readonly logger: Logger;

  constructor(
    private readonly store: ICartRepository,
    options?: { logger?: Logger }
  ) {
    this.logger = options?.logger ?? createSilentLogger();
    this.reload();
  }

  // cart lines are resolved against the freshly loaded catalog
  reload(): void {
    this.catalog = new Map(this.store.loadCatalog().map((product): [string, Product] => [product.productId, product]));
    this.lines = new Map(
      this.store.loadCart(this.catalog).map((line): [string, CartLine] => [line.product.productId, line])
    );
    this.logger.debug(
      { products: this.catalog.size, cartLines: this.lines.size },
      'Loaded catalog and cart'
    );
  }

  addItem(productId: string, quantity: number): boolean {
    const product = this.catalog.get(productId);
    if (!product || !Number.isInteger(quantity) || quantity <= 0) {
      return false;
    }

    this.ensureAvailable(product, quantity);
    if (!decreaseAvailable(product, quantity)) {
      return false;
    }

    const line = this.lines.get(productId);
    if (line) {
      setQuantity(line, line.quantity + quantity);
    } else {
      this.lines.set(productId, { product, quantity });
    }

    this.commit({ action: 'ADD', productId, productName: product.name, quantity, details: '' });
    return true;
  }

  // returns the whole reservation to the catalog
  removeItem(productId: string): boolean {
    const line = this.lines.get(productId);
    if (!line) {
      return false;
    }

    increaseAvailable(line.product, line.quantity);
    this.lines.delete(productId);

    this.commit({
      action: 'REMOVE',
      productId,
      productName: line.product.name,
      quantity: line.quantity,
      details: '',
    });
    return true;
  }

  updateQuantity(productId: string, newQuantity: number): boolean {
    const line = this.lines.get(productId);
    if (!line || !Number.isInteger(newQuantity) || newQuantity < 0) {
      return false;
    }

    const previous = line.quantity;
    if (newQuantity === previous) {
      return true;
    }

    const diff = newQuantity - previous;
    if (diff > 0) {
      this.ensureAvailable(line.product, diff);
      if (!decreaseAvailable(line.product, diff)) {
        return false;
      }
    } else {
      increaseAvailable(line.product, -diff);
    }

    setQuantity(line, newQuantity);
    // dropping to zero removes the line, but it is still logged as an UPDATE
    if (newQuantity === 0) {
      this.lines.delete(productId);
    }

    this.commit({
      action: 'UPDATE',
      productId,
      productName: line.product.name,
      quantity: newQuantity,
      details: `Previous quantity: ${previous}`,
    });
    return true;
  }

  /**
   * Empties the cart without returning stock: checked-out units are consumed.
   * A zero total counts as an empty cart and changes nothing.
   */
  checkout(): CheckoutResult {
    const total = this.getTotal();
    if (total <= 0) {
      return { status: 'empty' };
    }

    const itemCount = this.lines.size;
    this.lines.clear();
    this.store.saveCart([]);

    this.logger.info({ total, itemCount }, 'Checkout complete');
    return { status: 'completed', total, itemCount };
  }

  getTotal(): number {
    let total = 0;
    for (const line of this.lines.values()) {
      total += subtotal(line);
    }
    return total;
  }

  // Read access hands out copies; stock only changes through the operations above.
  getProduct(productId: string): Product | undefined {
    const product = this.catalog.get(productId);
    return product ? { ...product } : undefined;
  }

  getProducts(): readonly Product[] {
    return [...this.catalog.values()].map(product => ({ ...product }));
  }

  getCartLine(productId: string): CartLine | undefined {
    const line = this.lines.get(productId);
    return line ? copyLine(line) : undefined;
  }

  getCartLines(): readonly CartLine[] {
    return [...this.lines.values()].map(copyLine);
  }

  isCartEmpty(): boolean {
    return this.lines.size === 0;
  }

  // only ever seeds an empty catalog; copies so the seed list stays untouched
  initializeSampleCatalog(products: readonly Product[] = SAMPLE_CATALOG): boolean {
    if (this.catalog.size > 0) {
      return false;
    }

    this.catalog = new Map(products.map((product): [string, Product] => [product.productId, { ...product }]));
    // cart lines dropped on load (no matching product) must not come back on restart
    this.store.saveCatalog(this.getProducts());
    this.store.saveCart(this.getCartLines());

    this.logger.info({ products: this.catalog.size }, 'Seeded sample catalog');
    return true;
  }

  private ensureAvailable(product: Product, requested: number): void {
    if (product.quantityAvailable < requested) {
      this.logger.warn(
        { productId: product.productId, available: product.quantityAvailable, requested },
        'Insufficient stock'
      );
      throw new InventoryError(product.productId, product.name, product.quantityAvailable, requested);
    }
  }

  private commit(entry: TransactionEntry): void {
    this.store.saveCatalog(this.getProducts());
    this.store.saveCart(this.getCartLines());
    this.store.appendTransaction(entry);

    this.logger.debug({ ...entry }, 'Cart updated');
  }
}

function copyLine(line: CartLine): CartLine {
  return { product: { ...line.product }, quantity: line.quantity };
}
