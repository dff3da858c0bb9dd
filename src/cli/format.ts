import { CartLine, Product } from '../domain/models.js';
import { subtotal } from '../domain/product.js';

const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatMoney(amount: number): string {
  return `₹${amountFormat.format(amount)}`;
}

export function describeProduct(product: Product): string {
  const lines = [
    `ID: ${product.productId}`,
    `Name: ${product.name}`,
    `Price: ${formatMoney(product.price)}`,
    `Available: ${product.quantityAvailable}`,
  ];

  switch (product.type) {
    case 'physical':
      lines.push(`Weight: ${product.weight} kg`, 'Type: Physical Product');
      break;
    case 'digital':
      lines.push(`Download: ${product.downloadLink}`, 'Type: Digital Product');
      break;
    case 'generic':
      break;
  }
  return lines.join('\n');
}

export function describeCartLine(line: CartLine): string {
  return (
    `Item: ${line.product.name}, Quantity: ${line.quantity}, ` +
    `Price: ${formatMoney(line.product.price)}, Subtotal: ${formatMoney(subtotal(line))}`
  );
}
