import { appendFileSync, existsSync, mkdirSync, readFileSync, renameSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { CartLine, Product, TransactionEntry } from '../../domain/models.js';
import { Logger } from '../../utils/logger.js';
import { TRANSACTION_LOG_HEADER, formatCsvRow, formatTimestamp } from '../csv.js';
import { ICartRepository } from './ICartRepository.js';
import {
  parseCatalogRecords,
  resolveCartRecords,
  toCartLineRecord,
  toProductRecord,
} from './records.js';

export interface CartFiles {
  catalogFile: string;
  cartFile: string;
  transactionLogFile: string;
}

/**
 * System of record: catalog and cart as JSON arrays, transactions as CSV.
 *
 * Loads never fail. A missing, unreadable or non-array file reads as empty, and
 * records that do not parse are skipped with a warning. Saves rewrite the whole
 * file through a temp file and a rename; write errors propagate.
 *
 * The transaction log is appended to, one LF-terminated row per mutation,
 * under a header written once when the file is new or empty.
 */
export class JsonFileCartRepository implements ICartRepository {
  private readonly now: () => Date;

  constructor(
    private readonly files: CartFiles,
    private readonly logger: Logger,
    options?: { now?: () => Date }
  ) {
    this.now = options?.now ?? (() => new Date());
    this.initializeFiles();
  }

  loadCatalog(): Product[] {
    const records = this.readRecords(this.files.catalogFile, 'catalog');
    return parseCatalogRecords(records, (index, message) => {
      this.logger.warn({ file: this.files.catalogFile, index, reason: message }, 'Skipping unreadable product record');
    });
  }

  saveCatalog(products: readonly Product[]): void {
    this.writeJson(this.files.catalogFile, products.map(toProductRecord));
  }

  loadCart(catalog: ReadonlyMap<string, Product>): CartLine[] {
    const records = this.readRecords(this.files.cartFile, 'cart');
    return resolveCartRecords(records, catalog, (index, message) => {
      this.logger.warn({ file: this.files.cartFile, index, reason: message }, 'Skipping unreadable cart record');
    });
  }

  saveCart(lines: readonly CartLine[]): void {
    this.writeJson(this.files.cartFile, lines.map(toCartLineRecord));
  }

  appendTransaction(entry: TransactionEntry): void {
    const row = formatCsvRow([
      formatTimestamp(this.now()),
      entry.action,
      entry.productId,
      entry.productName,
      entry.quantity,
      entry.details,
    ]);
    appendFileSync(this.files.transactionLogFile, `${row}\n`);
  }

  private initializeFiles(): void {
    const { catalogFile, cartFile, transactionLogFile } = this.files;

    for (const file of [catalogFile, cartFile, transactionLogFile]) {
      mkdirSync(path.dirname(file), { recursive: true });
    }

    for (const file of [catalogFile, cartFile]) {
      if (!existsSync(file)) {
        writeFileSync(file, '[]');
      }
    }

    // header goes in exactly once: on a new file, or on one left empty
    if (!existsSync(transactionLogFile) || statSync(transactionLogFile).size === 0) {
      writeFileSync(transactionLogFile, `${formatCsvRow(TRANSACTION_LOG_HEADER)}\n`);
    }
  }

  private readRecords(file: string, label: string): unknown[] {
    let text: string;
    try {
      text = readFileSync(file, 'utf8');
    } catch (err) {
      this.logger.warn({ err, file }, `Could not read ${label} file, starting empty`);
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      this.logger.warn({ err, file }, `Corrupt ${label} file, starting empty`);
      return [];
    }

    if (!Array.isArray(data)) {
      this.logger.warn({ file }, `Expected a JSON array in ${label} file, starting empty`);
      return [];
    }
    return data;
  }

  private writeJson(file: string, data: unknown): void {
    const tempFile = `${file}.tmp`;
    writeFileSync(tempFile, JSON.stringify(data, null, 2));
    renameSync(tempFile, file);
  }
}
