import { query, withTransaction, type ClientPool, type Queryable } from '../db.js';
import type { RowErrorPolicy } from '../config.js';
import type { Period } from '../utils/period.js';
import { toNumericOrZero } from '../utils/numeric.js';
import { logUpload } from '../utils/upload-log.js';

export type CustomerRecord = {
  id: string;
  code: string;
  salesman: string | null;
};

export type BrandRecord = {
  id: string;
  name: string;
};

export type SalesFactRecord = {
  id: string;
  customerId: string;
  brandId: string;
  period: Period;
  quantity: number;
};

export type Created<T> = {
  record: T;
  created: boolean;
};

export type CustomerPeriodInput = {
  customerId: string;
  period: Period;
  total: number | null;
  itemCount: number | null;
};

export type UploadRecordInput = {
  period: Period;
  filename: string | null;
  policy: RowErrorPolicy;
  summary: unknown;
};

/**
 * Natural-key operations the ingestion writer needs. Every call runs inside
 * the transaction that produced this handle.
 */
export interface SalesStoreTransaction {
  /** Blocks until no other upload of the same period holds the lock. */
  lockPeriod(period: Period): Promise<void>;
  findCustomerByCode(code: string): Promise<CustomerRecord | null>;
  /**
   * Inserts the customer unless another transaction committed the same code
   * first; `created` tells which happened.
   */
  insertCustomer(input: { code: string; salesman: string | null }): Promise<Created<CustomerRecord>>;
  updateCustomerSalesman(customerId: string, salesman: string | null): Promise<void>;
  upsertCustomerPeriod(input: CustomerPeriodInput): Promise<void>;
  findBrandByName(name: string): Promise<BrandRecord | null>;
  insertBrand(name: string): Promise<Created<BrandRecord>>;
  findFact(customerId: string, brandId: string, period: Period): Promise<SalesFactRecord | null>;
  insertFact(input: Omit<SalesFactRecord, 'id'>): Promise<SalesFactRecord>;
  updateFactQuantity(factId: string, quantity: number): Promise<void>;
  /** Deletes the customer's facts for the period whose brand is not listed; returns how many went. */
  deleteFactsExcept(customerId: string, period: Period, keepBrandIds: string[]): Promise<number>;
  recordUpload(input: UploadRecordInput): Promise<string>;
}

export interface SalesStore {
  transaction<T>(fn: (tx: SalesStoreTransaction) => Promise<T>): Promise<T>;
}

type CustomerRow = {
  id: string;
  code: string;
  salesman: string | null;
};

type FactRow = {
  id: string;
  customer_id: string;
  brand_id: string;
  quantity: string;
};

function mapCustomer(row: CustomerRow): CustomerRecord {
  return { id: row.id, code: row.code, salesman: row.salesman };
}

function pgTransaction(client: Queryable): SalesStoreTransaction {
  const tx: SalesStoreTransaction = {
    async lockPeriod(period) {
      await query(client, 'select pg_advisory_xact_lock(hashtext($1))', [`sales_fact:${period}`]);
    },

    async findCustomerByCode(code) {
      const { rows } = await query<CustomerRow>(client, 'select id, code, salesman from customer where code = $1', [
        code,
      ]);
      return rows[0] ? mapCustomer(rows[0]) : null;
    },

    async insertCustomer({ code, salesman }) {
      // uploads of other periods may be creating the same customer
      const inserted = await query<CustomerRow>(
        client,
        `insert into customer (code, salesman)
         values ($1, $2)
         on conflict (code) do nothing
         returning id, code, salesman`,
        [code, salesman]
      );
      if (inserted.rows[0]) {
        return { record: mapCustomer(inserted.rows[0]), created: true };
      }
      const existing = await tx.findCustomerByCode(code);
      if (!existing) {
        throw new Error(`customer ${code} conflicted on insert but cannot be read`);
      }
      return { record: existing, created: false };
    },

    async updateCustomerSalesman(customerId, salesman) {
      await query(client, 'update customer set salesman = $2, updated_at = now() where id = $1', [
        customerId,
        salesman,
      ]);
    },

    async upsertCustomerPeriod({ customerId, period, total, itemCount }) {
      await query(
        client,
        `insert into customer_period (customer_id, period, total, item_count)
         values ($1, $2, $3, $4)
         on conflict (customer_id, period) do update set
           total = excluded.total,
           item_count = excluded.item_count,
           updated_at = now()`,
        [customerId, period, total, itemCount]
      );
    },

    async findBrandByName(name) {
      const { rows } = await query<BrandRecord>(client, 'select id, name from brand where name = $1', [name]);
      return rows[0] ?? null;
    },

    async insertBrand(name) {
      const inserted = await query<BrandRecord>(
        client,
        'insert into brand (name) values ($1) on conflict (name) do nothing returning id, name',
        [name]
      );
      if (inserted.rows[0]) {
        return { record: inserted.rows[0], created: true };
      }
      const existing = await tx.findBrandByName(name);
      if (!existing) {
        throw new Error(`brand "${name}" conflicted on insert but cannot be read`);
      }
      return { record: existing, created: false };
    },

    async findFact(customerId, brandId, period) {
      const { rows } = await query<FactRow>(
        client,
        `select id, customer_id, brand_id, quantity
         from sales_fact
         where customer_id = $1 and brand_id = $2 and period = $3`,
        [customerId, brandId, period]
      );
      const row = rows[0];
      if (!row) return null;
      return {
        id: row.id,
        customerId: row.customer_id,
        brandId: row.brand_id,
        period,
        quantity: toNumericOrZero(row.quantity),
      };
    },

    async insertFact(input) {
      const { rows } = await query<{ id: string }>(
        client,
        `insert into sales_fact (customer_id, brand_id, period, quantity)
         values ($1, $2, $3, $4)
         returning id`,
        [input.customerId, input.brandId, input.period, input.quantity]
      );
      return { id: rows[0].id, ...input };
    },

    async updateFactQuantity(factId, quantity) {
      await query(client, 'update sales_fact set quantity = $2, updated_at = now() where id = $1', [
        factId,
        quantity,
      ]);
    },

    async deleteFactsExcept(customerId, period, keepBrandIds) {
      const result = await query(
        client,
        `delete from sales_fact
         where customer_id = $1 and period = $2 and not (brand_id = any($3::uuid[]))`,
        [customerId, period, keepBrandIds]
      );
      return result.rowCount ?? 0;
    },

    async recordUpload(input) {
      return logUpload({ ...input, client });
    },
  };
  return tx;
}

export function createPgSalesStore(pool: ClientPool): SalesStore {
  return {
    transaction(fn) {
      return withTransaction(pool, (client) => fn(pgTransaction(client)));
    },
  };
}
