import { InventoryError } from '../domain/errors/index.js';
import { InventoryLedger } from '../domain/services/InventoryLedger.js';
import { describeCartLine, describeProduct, formatMoney } from './format.js';
import { Prompt } from './prompt.js';

export interface MenuOutput {
  write(text: string): unknown;
}

const MENU = [
  '',
  'BAZAAR SHOPPING CART',
  '1. View Products',
  '2. Add Item to Cart',
  '3. View Cart',
  '4. Update Item Quantity',
  '5. Remove Item from Cart',
  '6. Checkout',
  '7. Exit',
].join('\n');

const FAREWELL = 'Thank you for shopping with us. Have a great day!';
const INVALID_NUMBER = 'Invalid input. Please enter a valid number.';

const INTEGER = /^[+-]?\d+$/;

// thrown when the prompt runs dry in the middle of a dialog
class InputClosed extends Error {}

/**
 * Line-oriented shell over the ledger. Holds no cart state of its own: every
 * action goes through the ledger and is rendered from what it reports back.
 */
export class ShoppingMenu {
  constructor(
    private readonly ledger: InventoryLedger,
    private readonly prompt: Prompt,
    private readonly output: MenuOutput
  ) {}

  async run(): Promise<void> {
    let running = true;
    try {
      while (running) {
        this.print(MENU);
        running = await this.handle(await this.ask('\nEnter your choice: '));
      }
    } catch (err) {
      if (!(err instanceof InputClosed)) {
        throw err;
      }
      this.print(FAREWELL);
    }
  }

  // false once the session should end
  async handle(choice: string): Promise<boolean> {
    try {
      switch (choice.trim()) {
        case '1':
          this.showProducts();
          break;
        case '2':
          await this.addItem();
          break;
        case '3':
          this.showCart();
          break;
        case '4':
          await this.updateQuantity();
          break;
        case '5':
          await this.removeItem();
          break;
        case '6':
          this.checkout();
          break;
        case '7':
          this.print(FAREWELL);
          return false;
        default:
          this.print('Invalid choice. Please try again.');
      }
    } catch (err) {
      // stock warnings are recoverable; anything else ends the session
      if (!(err instanceof InventoryError)) {
        throw err;
      }
      this.print(`Inventory Error: ${err.message}`);
    }
    return true;
  }

  private async addItem(): Promise<void> {
    this.showProducts();
    const productId = (await this.ask('Enter product ID: ')).trim();
    const quantity = this.parseInteger(await this.ask('Enter quantity: '));
    if (quantity === undefined) {
      return;
    }
    if (quantity <= 0) {
      this.print('Quantity must be positive!');
      return;
    }

    if (this.ledger.addItem(productId, quantity)) {
      this.print(`Added ${quantity} item(s) to your cart`);
    } else {
      this.print('Failed to add item. Check product ID.');
    }
  }

  private async updateQuantity(): Promise<void> {
    this.showCart();
    if (this.ledger.isCartEmpty()) {
      return;
    }

    const productId = (await this.ask('Enter product ID to update: ')).trim();
    const quantity = this.parseInteger(await this.ask('Enter new quantity: '));
    if (quantity === undefined) {
      return;
    }
    if (quantity < 0) {
      this.print('Quantity cannot be negative!');
      return;
    }

    if (this.ledger.updateQuantity(productId, quantity)) {
      this.print('Cart updated successfully');
    } else {
      this.print('Product not found in cart');
    }
  }

  private async removeItem(): Promise<void> {
    this.showCart();
    if (this.ledger.isCartEmpty()) {
      return;
    }

    const productId = (await this.ask('Enter product ID to remove: ')).trim();
    if (this.ledger.removeItem(productId)) {
      this.print('Item removed from cart');
    } else {
      this.print('Product not found in cart');
    }
  }

  private checkout(): void {
    const result = this.ledger.checkout();
    if (result.status === 'empty') {
      this.print('Your cart is empty. Add items before checkout.');
      return;
    }
    this.print(`\nCheckout Complete! Total: ${formatMoney(result.total)}`);
    this.print('Thank you for shopping with us!');
  }

  private showProducts(): void {
    const products = this.ledger.getProducts();
    if (products.length === 0) {
      this.print('No products available at the moment.');
      return;
    }

    this.print('\nAvailable Products:');
    for (const product of products) {
      this.print(`\n${describeProduct(product)}`);
      this.print('-'.repeat(40));
    }
  }

  private showCart(): void {
    if (this.ledger.isCartEmpty()) {
      this.print('Your shopping cart is empty.');
      return;
    }

    const rule = '-'.repeat(60);
    this.print('\nYour Shopping Cart:');
    this.print(rule);
    for (const line of this.ledger.getCartLines()) {
      this.print(`* ${describeCartLine(line)}`);
    }
    this.print(rule);
    this.print(`GRAND TOTAL: ${formatMoney(this.ledger.getTotal())}`);
    this.print(rule);
  }

  private parseInteger(text: string): number | undefined {
    const trimmed = text.trim();
    if (!INTEGER.test(trimmed)) {
      this.print(INVALID_NUMBER);
      return undefined;
    }
    return Number(trimmed);
  }

  private async ask(question: string): Promise<string> {
    const answer = await this.prompt.ask(question);
    if (answer === undefined) {
      throw new InputClosed('input closed');
    }
    return answer;
  }

  private print(text: string): void {
    this.output.write(`${text}\n`);
  }
}
