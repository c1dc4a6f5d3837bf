import { query, type Queryable } from '../db.js';
import type { Period } from '../utils/period.js';
import { toNumeric, toNumericOrZero } from '../utils/numeric.js';

export type Paging = {
  offset: number;
  limit: number;
};

export type CustomerListFilter = Paging & {
  salesman?: string;
  code?: string;
};

export type FactFilter = Paging & {
  customerCode?: string;
  brand?: string;
  period?: Period;
};

export type CustomerView = {
  id: string;
  code: string;
  salesman: string | null;
};

export type FactView = {
  id: string;
  customer_id: string;
  customer_code: string;
  brand: string;
  period: string;
  quantity: number;
};

export type BrandTotal = {
  brand: string;
  total_quantity: number;
};

export type CustomerTotal = CustomerView & {
  total: number;
  item_count: number;
};

export type UploadView = {
  id: string;
  period: string;
  filename: string | null;
  policy: string;
  summary: unknown;
  created_at: string;
};

export interface SalesQueries {
  now(): Promise<string>;
  listCustomers(filter: CustomerListFilter): Promise<CustomerView[]>;
  findCustomer(id: string): Promise<CustomerView | null>;
  listFacts(filter: FactFilter): Promise<FactView[]>;
  brandTotals(filter: Paging & { period?: Period }): Promise<BrandTotal[]>;
  totalSales(period?: Period): Promise<number>;
  topCustomers(limit: number, period?: Period): Promise<CustomerTotal[]>;
  listUploads(limit: number): Promise<UploadView[]>;
}

type FactRow = Omit<FactView, 'quantity'> & { quantity: string };
type BrandTotalRow = { brand: string; total_quantity: string | null };
type CustomerTotalRow = CustomerView & { total: string | null; item_count: string | null };

function mapFact(row: FactRow): FactView {
  return { ...row, quantity: toNumericOrZero(row.quantity) };
}

function mapCustomerTotal(row: CustomerTotalRow): CustomerTotal {
  return {
    id: row.id,
    code: row.code,
    salesman: row.salesman,
    total: toNumericOrZero(row.total),
    item_count: toNumericOrZero(row.item_count),
  };
}

export function createPgSalesQueries(db: Queryable): SalesQueries {
  return {
    async now() {
      const { rows } = await query<{ now: string }>(db, 'select now()::text as now');
      return rows[0].now;
    },

    async listCustomers({ salesman, code, offset, limit }) {
      const params: unknown[] = [];
      const conditions: string[] = [];
      if (salesman) {
        params.push(salesman);
        conditions.push(`salesman = $${params.length}`);
      }
      if (code) {
        params.push(code);
        conditions.push(`code = $${params.length}`);
      }
      params.push(limit, offset);
      const whereClause = conditions.length ? `where ${conditions.join(' and ')}` : '';

      const { rows } = await query<CustomerView>(
        db,
        `select id, code, salesman
         from customer
         ${whereClause}
         order by code asc
         limit $${params.length - 1} offset $${params.length}`,
        params
      );
      return rows;
    },

    async findCustomer(id) {
      const { rows } = await query<CustomerView>(db, 'select id, code, salesman from customer where id = $1', [id]);
      return rows[0] ?? null;
    },

    async listFacts({ customerCode, brand, period, offset, limit }) {
      const params: unknown[] = [];
      const conditions: string[] = [];
      if (customerCode) {
        params.push(customerCode);
        conditions.push(`c.code = $${params.length}`);
      }
      if (brand) {
        params.push(brand);
        conditions.push(`b.name = $${params.length}`);
      }
      if (period) {
        params.push(period);
        conditions.push(`f.period = $${params.length}`);
      }
      params.push(limit, offset);
      const whereClause = conditions.length ? `where ${conditions.join(' and ')}` : '';

      const { rows } = await query<FactRow>(
        db,
        `select f.id, f.customer_id, c.code as customer_code, b.name as brand, f.period, f.quantity
         from sales_fact f
         join customer c on c.id = f.customer_id
         join brand b on b.id = f.brand_id
         ${whereClause}
         order by f.period desc, c.code asc, b.name asc
         limit $${params.length - 1} offset $${params.length}`,
        params
      );
      return rows.map(mapFact);
    },

    async brandTotals({ period, offset, limit }) {
      const params: unknown[] = [];
      let whereClause = '';
      if (period) {
        params.push(period);
        whereClause = 'where f.period = $1';
      }
      params.push(limit, offset);

      const { rows } = await query<BrandTotalRow>(
        db,
        `select b.name as brand, sum(f.quantity) as total_quantity
         from sales_fact f
         join brand b on b.id = f.brand_id
         ${whereClause}
         group by b.name
         order by total_quantity desc, b.name asc
         limit $${params.length - 1} offset $${params.length}`,
        params
      );
      return rows.map((row) => ({ brand: row.brand, total_quantity: toNumericOrZero(row.total_quantity) }));
    },

    async totalSales(period) {
      const { rows } = await query<{ total: string | null }>(
        db,
        period
          ? 'select sum(total) as total from customer_period where period = $1'
          : 'select sum(total) as total from customer_period',
        period ? [period] : []
      );
      return toNumeric(rows[0]?.total ?? null) ?? 0;
    },

    async topCustomers(limit, period) {
      const params: unknown[] = [];
      let whereClause = '';
      if (period) {
        params.push(period);
        whereClause = 'where cp.period = $1';
      }
      params.push(limit);

      const { rows } = await query<CustomerTotalRow>(
        db,
        `select c.id, c.code, c.salesman, sum(cp.total) as total, sum(cp.item_count) as item_count
         from customer_period cp
         join customer c on c.id = cp.customer_id
         ${whereClause}
         group by c.id, c.code, c.salesman
         order by total desc nulls last, c.code asc
         limit $${params.length}`,
        params
      );
      return rows.map(mapCustomerTotal);
    },

    async listUploads(limit) {
      const { rows } = await query<UploadView>(
        db,
        `select id, period, filename, policy, summary, created_at
         from upload_batch
         order by created_at desc
         limit $1`,
        [limit]
      );
      return rows;
    },
  };
}
