import { query, type Queryable } from './db.js';

export async function ensureSchema(db: Queryable): Promise<void> {
  await query(db, `create extension if not exists pgcrypto`);

  await query(
    db,
    `
    create table if not exists customer (
      id uuid primary key default gen_random_uuid(),
      code text not null unique,
      salesman text,
      created_at timestamptz not null default now(),
      updated_at timestamptz not null default now()
    )
  `
  );

  await query(
    db,
    `
    create table if not exists brand (
      id uuid primary key default gen_random_uuid(),
      name text not null unique,
      created_at timestamptz not null default now()
    )
  `
  );

  await query(
    db,
    `
    create table if not exists sales_fact (
      id uuid primary key default gen_random_uuid(),
      customer_id uuid not null references customer(id),
      brand_id uuid not null references brand(id),
      period text not null check (period ~ '^[0-9]{4}-(0[1-9]|1[0-2])$'),
      quantity numeric(14,3) not null check (quantity > 0),
      updated_at timestamptz not null default now(),
      constraint sales_fact_natural_key unique (customer_id, brand_id, period)
    )
  `
  );

  await query(
    db,
    `
    create table if not exists customer_period (
      customer_id uuid not null references customer(id),
      period text not null,
      total numeric(14,2),
      item_count integer,
      updated_at timestamptz not null default now(),
      primary key (customer_id, period)
    )
  `
  );

  await query(
    db,
    `
    create table if not exists upload_batch (
      id uuid primary key default gen_random_uuid(),
      period text not null,
      filename text,
      policy text not null,
      summary jsonb not null,
      created_at timestamptz not null default now()
    )
  `
  );

  await query(db, `create index if not exists idx_sales_fact_period on sales_fact(period)`);
  await query(db, `create index if not exists idx_customer_period_period on customer_period(period)`);
  await query(db, `create index if not exists idx_upload_batch_created on upload_batch(created_at)`);
}

export async function hasSalesData(db: Queryable): Promise<boolean> {
  const { rows } = await query<{ present: boolean }>(db, 'select exists (select 1 from customer) as present');
  return rows[0]?.present ?? false;
}
