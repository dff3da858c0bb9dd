import { CartLine, Product } from './models.js';
import { ValidationError } from './errors/index.js';

// Counter operations on catalog entries and cart lines. Only the ledger calls
// the mutating ones, always in increase/decrease pairs.

// no-op (false) on a non-positive amount or insufficient stock, never throws
export function decreaseAvailable(product: Product, amount: number): boolean {
  if (amount <= 0 || amount > product.quantityAvailable) {
    return false;
  }
  product.quantityAvailable -= amount;
  return true;
}

export function increaseAvailable(product: Product, amount: number): void {
  if (amount <= 0) {
    throw new ValidationError('Amount must be positive');
  }
  product.quantityAvailable += amount;
}

export function setAvailable(product: Product, value: number): void {
  if (value < 0) {
    throw new ValidationError('Quantity cannot be negative');
  }
  product.quantityAvailable = value;
}

export function setQuantity(line: CartLine, value: number): void {
  if (value < 0) {
    throw new ValidationError('Quantity cannot be negative');
  }
  line.quantity = value;
}

export function subtotal(line: CartLine): number {
  return line.product.price * line.quantity;
}
