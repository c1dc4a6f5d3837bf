import type { RowErrorPolicy } from '../config.js';
import { IngestionError, PersistenceError } from '../errors.js';
import { roundQuantity } from '../utils/numeric.js';
import { parsePeriod, type Period } from '../utils/period.js';
import { DEFAULT_SHEET_LAYOUT, openSalesSheet, type SalesRowRecord, type SheetLayout } from './sales-sheet-parser.js';
import type { BrandRecord, SalesStore, SalesStoreTransaction } from './sales-store.js';

export type SkippedRow = {
  rowNumber: number;
  code: 'missing_identity';
  message: string;
};

export type UploadCounts = {
  rowsProcessed: number;
  rowsSkipped: number;
  customersCreated: number;
  customersUpdated: number;
  brandsCreated: number;
  factsCreated: number;
  factsUpdated: number;
  factsUnchanged: number;
  factsRemoved: number;
  factsWritten: number;
};

export type UploadSummary = UploadCounts & {
  uploadId: string;
  period: Period;
  policy: RowErrorPolicy;
  brands: string[];
  skippedRows: SkippedRow[];
};

export type SalesUploadInput = {
  period: string;
  file: Buffer;
  filename?: string;
};

export type SalesUploadOptions = {
  layout?: SheetLayout;
  policy: RowErrorPolicy;
};

function emptyCounts(): UploadCounts {
  return {
    rowsProcessed: 0,
    rowsSkipped: 0,
    customersCreated: 0,
    customersUpdated: 0,
    brandsCreated: 0,
    factsCreated: 0,
    factsUpdated: 0,
    factsUnchanged: 0,
    factsRemoved: 0,
    factsWritten: 0,
  };
}

class UploadWriter {
  private readonly brandCache = new Map<string, BrandRecord>();

  constructor(
    private readonly tx: SalesStoreTransaction,
    private readonly period: Period,
    private readonly counts: UploadCounts
  ) {}

  private async resolveBrand(name: string): Promise<BrandRecord> {
    const cached = this.brandCache.get(name);
    if (cached) return cached;
    let brand = await this.tx.findBrandByName(name);
    if (!brand) {
      const inserted = await this.tx.insertBrand(name);
      if (inserted.created) this.counts.brandsCreated += 1;
      brand = inserted.record;
    }
    this.brandCache.set(name, brand);
    return brand;
  }

  async writeRow(row: SalesRowRecord): Promise<void> {
    const { tx, period, counts } = this;

    let customer = await tx.findCustomerByCode(row.customerCode);
    let created = false;
    if (!customer) {
      // an upload of another period may create the same customer meanwhile
      const inserted = await tx.insertCustomer({ code: row.customerCode, salesman: row.salesman });
      customer = inserted.record;
      created = inserted.created;
    }
    if (created) {
      counts.customersCreated += 1;
    } else if (row.salesman !== null && row.salesman !== customer.salesman) {
      await tx.updateCustomerSalesman(customer.id, row.salesman);
      counts.customersUpdated += 1;
    }

    await tx.upsertCustomerPeriod({
      customerId: customer.id,
      period,
      total: row.total,
      itemCount: row.itemCount,
    });

    const keptBrandIds: string[] = [];
    for (const [brandName, cellQuantity] of row.quantities) {
      // stored as numeric(14,3); compare and filter at that precision
      const quantity = roundQuantity(cellQuantity);
      // zero means "did not buy": no fact row
      if (!(quantity > 0)) continue;
      const brand = await this.resolveBrand(brandName);
      keptBrandIds.push(brand.id);

      const existing = await tx.findFact(customer.id, brand.id, period);
      if (!existing) {
        await tx.insertFact({ customerId: customer.id, brandId: brand.id, period, quantity });
        counts.factsCreated += 1;
      } else if (existing.quantity !== quantity) {
        await tx.updateFactQuantity(existing.id, quantity);
        counts.factsUpdated += 1;
      } else {
        counts.factsUnchanged += 1;
      }
    }

    counts.factsRemoved += await tx.deleteFactsExcept(customer.id, period, keptBrandIds);
    counts.rowsProcessed += 1;
  }
}

/**
 * Loads one monthly workbook for `input.period`. The period and the header are
 * checked before anything is written; all writes share one transaction, so a
 * failed upload leaves the previous state of the period untouched.
 */
export async function ingestSalesWorkbook(
  store: SalesStore,
  input: SalesUploadInput,
  options: SalesUploadOptions
): Promise<UploadSummary> {
  const period = parsePeriod(input.period);
  const sheet = openSalesSheet(input.file, options.layout ?? DEFAULT_SHEET_LAYOUT);
  const brands = sheet.schema.brandColumns.map((column) => column.name);
  const { policy } = options;

  try {
    return await store.transaction(async (tx) => {
      await tx.lockPeriod(period);

      const counts = emptyCounts();
      const skippedRows: SkippedRow[] = [];
      const writer = new UploadWriter(tx, period, counts);

      for (const parsed of sheet.rows()) {
        if (parsed.kind === 'error') {
          if (policy === 'fail-fast') {
            throw parsed.error;
          }
          skippedRows.push({
            rowNumber: parsed.error.rowNumber,
            code: parsed.error.code,
            message: parsed.error.message,
          });
          counts.rowsSkipped += 1;
          continue;
        }
        await writer.writeRow(parsed.record);
      }

      counts.factsWritten = counts.factsCreated + counts.factsUpdated;
      const summary = { period, policy, brands, ...counts, skippedRows };
      const uploadId = await tx.recordUpload({
        period,
        filename: input.filename ?? null,
        policy,
        summary,
      });
      return { uploadId, ...summary };
    });
  } catch (error) {
    if (error instanceof IngestionError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new PersistenceError(`failed to store sales for ${period}: ${message}`, { cause: error });
  }
}
