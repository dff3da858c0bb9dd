export type ProductType = 'physical' | 'digital' | 'generic';

interface ProductBase {
  readonly productId: string;
  readonly name: string;
  readonly price: number;
  quantityAvailable: number;
}

export interface PhysicalProduct extends ProductBase {
  readonly type: 'physical';
  readonly weight: number; // kg
}

export interface DigitalProduct extends ProductBase {
  readonly type: 'digital';
  readonly downloadLink: string;
}

export interface GenericProduct extends ProductBase {
  readonly type: 'generic';
}

export type Product = PhysicalProduct | DigitalProduct | GenericProduct;

// product is the catalog's own object, never a copy
export interface CartLine {
  readonly product: Product;
  quantity: number;
}

export type TransactionAction = 'ADD' | 'REMOVE' | 'UPDATE';

export interface TransactionEntry {
  action: TransactionAction;
  productId: string;
  productName: string;
  quantity: number;
  details: string;
}

export type CheckoutResult =
  | { status: 'completed'; total: number; itemCount: number }
  | { status: 'empty' };
