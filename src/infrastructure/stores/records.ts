import { z } from 'zod';
import { CartLine, Product } from '../../domain/models.js';

// On-disk shapes of catalog and cart entries, shared by every repository.

const baseRecordSchema = z.object({
  type: z.unknown().optional(),
  product_id: z.string().min(1),
  name: z.string(),
  price: z.number().nonnegative(),
  quantity_available: z.number().int(),
});

const physicalPayloadSchema = z.object({ weight: z.number() });
const digitalPayloadSchema = z.object({ download_link: z.string() });

const cartLineRecordSchema = z.object({
  product_id: z.string(),
  quantity: z.number().int(),
});

interface ProductRecordBase {
  product_id: string;
  name: string;
  price: number;
  quantity_available: number;
}

export type ProductRecord =
  | ({ type: 'physical'; weight: number } & ProductRecordBase)
  | ({ type: 'digital'; download_link: string } & ProductRecordBase)
  | ({ type: 'generic' } & ProductRecordBase);

export type CartLineRecord = z.infer<typeof cartLineRecordSchema>;

type ParseResult<T> = { ok: true; value: T } | { ok: false; message: string };

export type SkipHandler = (index: number, message: string) => void;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'record'}: ${issue.message}`)
    .join('; ');
}

export function toProductRecord(product: Product): ProductRecord {
  const base: ProductRecordBase = {
    product_id: product.productId,
    name: product.name,
    price: product.price,
    quantity_available: product.quantityAvailable,
  };

  switch (product.type) {
    case 'physical':
      return { type: 'physical', ...base, weight: product.weight };
    case 'digital':
      return { type: 'digital', ...base, download_link: product.downloadLink };
    case 'generic':
      return { type: 'generic', ...base };
  }
}

/**
 * Builds a product from a persisted record. `type` picks the variant; a missing
 * or unknown tag falls back to a generic product. Negative stock is clamped to 0.
 */
function parseProductRecord(raw: unknown): ParseResult<Product> {
  const parsed = baseRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, message: describeIssues(parsed.error) };
  }

  const record = parsed.data;
  const common = {
    productId: record.product_id,
    name: record.name,
    price: record.price,
    quantityAvailable: Math.max(0, record.quantity_available),
  };

  if (record.type === 'physical') {
    const payload = physicalPayloadSchema.safeParse(raw);
    if (!payload.success) {
      return { ok: false, message: describeIssues(payload.error) };
    }
    return { ok: true, value: { ...common, type: 'physical', weight: payload.data.weight } };
  }

  if (record.type === 'digital') {
    const payload = digitalPayloadSchema.safeParse(raw);
    if (!payload.success) {
      return { ok: false, message: describeIssues(payload.error) };
    }
    return { ok: true, value: { ...common, type: 'digital', downloadLink: payload.data.download_link } };
  }

  return { ok: true, value: { ...common, type: 'generic' } };
}

export function toCartLineRecord(line: CartLine): CartLineRecord {
  return { product_id: line.product.productId, quantity: line.quantity };
}

export function parseCatalogRecords(records: readonly unknown[], onSkip: SkipHandler): Product[] {
  const products: Product[] = [];
  records.forEach((raw, index) => {
    const result = parseProductRecord(raw);
    if (result.ok) {
      products.push(result.value);
    } else {
      onSkip(index, result.message);
    }
  });
  return products;
}

// unknown product ids are dropped without a warning, zero quantities too
export function resolveCartRecords(
  records: readonly unknown[],
  catalog: ReadonlyMap<string, Product>,
  onSkip: SkipHandler
): CartLine[] {
  const lines: CartLine[] = [];
  records.forEach((raw, index) => {
    const parsed = cartLineRecordSchema.safeParse(raw);
    if (!parsed.success) {
      onSkip(index, describeIssues(parsed.error));
      return;
    }

    const product = catalog.get(parsed.data.product_id);
    if (product && parsed.data.quantity > 0) {
      lines.push({ product, quantity: parsed.data.quantity });
    }
  });
  return lines;
}
