import { describe, it, expect, beforeEach } from 'vitest';
import { ShoppingMenu } from '../src/cli/ShoppingMenu.js';
import { Prompt } from '../src/cli/prompt.js';
import { InventoryLedger } from '../src/domain/services/InventoryLedger.js';
import { InMemoryCartRepository } from '../src/infrastructure/stores/InMemoryCartRepository.js';

class ScriptedPrompt implements Prompt {
  readonly questions: string[] = [];

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string | undefined> {
    this.questions.push(question);
    return this.answers.shift();
  }
}

class CapturedOutput {
  text = '';

  write(chunk: string): void {
    this.text += chunk;
  }

  lines(): string[] {
    return this.text.split('\n');
  }
}

class FailingRepository extends InMemoryCartRepository {
  saveCatalog(): void {
    throw new Error('disk full');
  }
}

const catalog = [
  { type: 'physical', product_id: '001A', name: 'Tata Salt 1kg', price: 28, quantity_available: 100, weight: 1 },
];

const FAREWELL = 'Thank you for shopping with us. Have a great day!';

describe('ShoppingMenu', () => {
  let ledger: InventoryLedger;
  let output: CapturedOutput;

  const run = async (answers: string[]): Promise<ScriptedPrompt> => {
    const prompt = new ScriptedPrompt(answers);
    await new ShoppingMenu(ledger, prompt, output).run();
    return prompt;
  };

  beforeEach(() => {
    ledger = new InventoryLedger(new InMemoryCartRepository({ catalog }));
    output = new CapturedOutput();
  });

  it('adds, shows and checks out a cart', async () => {
    const prompt = await run(['2', '001A', '10', '3', '6', '7']);

    expect(prompt.questions).toEqual([
      '\nEnter your choice: ',
      'Enter product ID: ',
      'Enter quantity: ',
      '\nEnter your choice: ',
      '\nEnter your choice: ',
      '\nEnter your choice: ',
    ]);

    const lines = output.lines();
    expect(lines).toContain('Added 10 item(s) to your cart');
    expect(lines).toContain('* Item: Tata Salt 1kg, Quantity: 10, Price: ₹28.00, Subtotal: ₹280.00');
    expect(lines).toContain('GRAND TOTAL: ₹280.00');
    expect(lines).toContain('Checkout Complete! Total: ₹280.00');
    expect(lines).toContain('Thank you for shopping with us!');
    expect(lines.at(-2)).toBe(FAREWELL);

    expect(ledger.isCartEmpty()).toBe(true);
    expect(ledger.getProduct('001A')?.quantityAvailable).toBe(90);
  });

  it('lists the catalog', async () => {
    await run(['1', '7']);

    const lines = output.lines();
    expect(lines).toContain('Available Products:');
    expect(lines).toContain('ID: 001A');
    expect(lines).toContain('Weight: 1 kg');
    expect(lines).toContain('-'.repeat(40));
  });

  it('shows a stock warning and keeps going', async () => {
    await run(['2', '001A', '101', '3', '7']);

    const lines = output.lines();
    expect(lines).toContain('Inventory Error: Insufficient stock for Tata Salt 1kg. Available: 100');
    expect(lines).toContain('Your shopping cart is empty.');
    expect(lines.at(-2)).toBe(FAREWELL);
  });

  it('rejects quantities that are not whole numbers', async () => {
    await run(['2', '001A', 'ten', '2', '001A', '2.5', '7']);

    expect(output.lines().filter(line => line === 'Invalid input. Please enter a valid number.')).toHaveLength(2);
    expect(ledger.isCartEmpty()).toBe(true);
  });

  it('rejects non-positive add quantities', async () => {
    await run(['2', '001A', '0', '7']);

    expect(output.lines()).toContain('Quantity must be positive!');
    expect(ledger.isCartEmpty()).toBe(true);
  });

  it('reports unknown products', async () => {
    await run(['2', 'XYZ', '1', '7']);

    expect(output.lines()).toContain('Failed to add item. Check product ID.');
  });

  it('updates a line down to zero', async () => {
    await run(['2', '001A', '10', '4', '001A', '0', '3', '7']);

    const lines = output.lines();
    expect(lines).toContain('Cart updated successfully');
    expect(lines).toContain('Your shopping cart is empty.');
    expect(ledger.getProduct('001A')?.quantityAvailable).toBe(100);
  });

  it('refuses a negative update', async () => {
    await run(['2', '001A', '3', '4', '001A', '-1', '7']);

    expect(output.lines()).toContain('Quantity cannot be negative!');
    expect(ledger.getCartLine('001A')?.quantity).toBe(3);
  });

  it('removes an item', async () => {
    await run(['2', '001A', '3', '5', '001A', '7']);

    expect(output.lines()).toContain('Item removed from cart');
    expect(ledger.isCartEmpty()).toBe(true);
  });

  it('reports a product missing from the cart', async () => {
    await run(['2', '001A', '3', '5', '002A', '7']);

    expect(output.lines()).toContain('Product not found in cart');
    expect(ledger.getCartLine('001A')?.quantity).toBe(3);
  });

  it('skips the follow-up questions when the cart is empty', async () => {
    const prompt = await run(['5', '4', '7']);

    expect(prompt.questions).toEqual(['\nEnter your choice: ', '\nEnter your choice: ', '\nEnter your choice: ']);
    expect(output.lines().filter(line => line === 'Your shopping cart is empty.')).toHaveLength(2);
  });

  it('reports an empty cart at checkout', async () => {
    await run(['6', '7']);

    expect(output.lines()).toContain('Your cart is empty. Add items before checkout.');
  });

  it('rejects unknown menu choices', async () => {
    await run(['9', '7']);

    expect(output.lines()).toContain('Invalid choice. Please try again.');
  });

  it('says goodbye when input ends mid-dialog', async () => {
    await run(['2', '001A']);

    expect(output.lines().at(-2)).toBe(FAREWELL);
    expect(ledger.isCartEmpty()).toBe(true);
  });

  it('lets persistence failures escape', async () => {
    ledger = new InventoryLedger(new FailingRepository({ catalog }));

    await expect(run(['2', '001A', '1'])).rejects.toThrow('disk full');
  });
});
