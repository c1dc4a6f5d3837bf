import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createPgSalesQueries } from '../services/sales-queries.js';
import { createPgSalesStore, type SalesStoreTransaction } from '../services/sales-store.js';
import { parsePeriod } from '../utils/period.js';

const JUNE = parsePeriod('2025-06');

function fakeClient() {
  return {
    query: vi.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
    release: vi.fn(),
  };
}

describe('postgres sales store', () => {
  let client: ReturnType<typeof fakeClient>;

  beforeEach(() => {
    client = fakeClient();
  });

  function runInTransaction<T>(fn: (tx: SalesStoreTransaction) => Promise<T>): Promise<T> {
    const pool = { connect: vi.fn().mockResolvedValue(client) };
    return createPgSalesStore(pool).transaction(fn);
  }

  function statements(): string[] {
    return client.query.mock.calls.map(([text]) => String(text).replace(/\s+/g, ' ').trim());
  }

  it('wraps the work in begin/commit and takes the period lock', async () => {
    await runInTransaction((tx) => tx.lockPeriod(JUNE));

    expect(statements()).toEqual(['begin', 'select pg_advisory_xact_lock(hashtext($1))', 'commit']);
    expect(client.query.mock.calls[1][1]).toEqual(['sales_fact:2025-06']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back and releases the client when the work fails', async () => {
    const error = await runInTransaction(async () => {
      throw new Error('boom');
    }).catch((caught: unknown) => caught);

    expect(error).toMatchObject({ message: 'boom' });
    expect(statements()).toEqual(['begin', 'rollback']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('reports a customer it inserted as created', async () => {
    client.query
      .mockResolvedValueOnce({ rows: [], rowCount: null })
      .mockResolvedValueOnce({ rows: [{ id: 'c1', code: 'X', salesman: 'Lee' }], rowCount: 1 });

    const result = await runInTransaction((tx) => tx.insertCustomer({ code: 'X', salesman: 'Lee' }));

    expect(result).toEqual({ record: { id: 'c1', code: 'X', salesman: 'Lee' }, created: true });
    expect(statements()[1]).toBe(
      'insert into customer (code, salesman) values ($1, $2) on conflict (code) do nothing returning id, code, salesman'
    );
    expect(client.query.mock.calls[1][1]).toEqual(['X', 'Lee']);
  });

  it('reads back the customer another transaction inserted first', async () => {
    client.query
      .mockResolvedValueOnce({ rows: [], rowCount: null })
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockResolvedValueOnce({ rows: [{ id: 'c1', code: 'X', salesman: 'Kim' }], rowCount: 1 });

    const result = await runInTransaction((tx) => tx.insertCustomer({ code: 'X', salesman: 'Lee' }));

    expect(result).toEqual({ record: { id: 'c1', code: 'X', salesman: 'Kim' }, created: false });
    expect(statements()[2]).toBe('select id, code, salesman from customer where code = $1');
    expect(client.query.mock.calls[2][1]).toEqual(['X']);
  });

  it('reads back the brand another transaction inserted first', async () => {
    client.query
      .mockResolvedValueOnce({ rows: [], rowCount: null })
      .mockResolvedValueOnce({ rows: [], rowCount: 0 })
      .mockResolvedValueOnce({ rows: [{ id: 'b1', name: 'Amoxil' }], rowCount: 1 });

    const result = await runInTransaction((tx) => tx.insertBrand('Amoxil'));

    expect(result).toEqual({ record: { id: 'b1', name: 'Amoxil' }, created: false });
    expect(statements()[1]).toBe(
      'insert into brand (name) values ($1) on conflict (name) do nothing returning id, name'
    );
    expect(statements()[2]).toBe('select id, name from brand where name = $1');
  });

  it('reads fact quantities from numeric strings', async () => {
    client.query
      .mockResolvedValueOnce({ rows: [], rowCount: null })
      .mockResolvedValueOnce({
        rows: [{ id: 'f1', customer_id: 'c1', brand_id: 'b1', quantity: '1.235' }],
        rowCount: 1,
      });

    const fact = await runInTransaction((tx) => tx.findFact('c1', 'b1', JUNE));

    expect(fact).toEqual({ id: 'f1', customerId: 'c1', brandId: 'b1', period: '2025-06', quantity: 1.235 });
    expect(client.query.mock.calls[1][1]).toEqual(['c1', 'b1', '2025-06']);
  });

  it('counts the facts it deletes for a customer and period', async () => {
    client.query
      .mockResolvedValueOnce({ rows: [], rowCount: null })
      .mockResolvedValueOnce({ rows: [], rowCount: 2 });

    const removed = await runInTransaction((tx) => tx.deleteFactsExcept('c1', JUNE, ['b1']));

    expect(removed).toBe(2);
    expect(statements()[1]).toBe(
      'delete from sales_fact where customer_id = $1 and period = $2 and not (brand_id = any($3::uuid[]))'
    );
    expect(client.query.mock.calls[1][1]).toEqual(['c1', '2025-06', ['b1']]);
  });

  it('writes the upload ledger row with the summary as json', async () => {
    client.query
      .mockResolvedValueOnce({ rows: [], rowCount: null })
      .mockResolvedValueOnce({ rows: [{ id: 'u1' }], rowCount: 1 });

    const id = await runInTransaction((tx) =>
      tx.recordUpload({ period: JUNE, filename: 'june.xlsx', policy: 'best-effort', summary: { rowsProcessed: 2 } })
    );

    expect(id).toBe('u1');
    expect(client.query.mock.calls[1][1]).toEqual(['2025-06', 'june.xlsx', 'best-effort', '{"rowsProcessed":2}']);
  });
});

describe('postgres sales queries', () => {
  it('numbers the filter and paging parameters in order', async () => {
    const db = fakeClient();
    db.query.mockResolvedValueOnce({
      rows: [{ id: 'f1', customer_id: 'c1', customer_code: 'X', brand: 'A', period: '2025-06', quantity: '4.500' }],
      rowCount: 1,
    });

    const facts = await createPgSalesQueries(db).listFacts({ brand: 'A', period: JUNE, offset: 0, limit: 100 });

    expect(facts).toEqual([
      { id: 'f1', customer_id: 'c1', customer_code: 'X', brand: 'A', period: '2025-06', quantity: 4.5 },
    ]);
    const [text, params] = db.query.mock.calls[0];
    expect(String(text)).toContain('where b.name = $1 and f.period = $2');
    expect(String(text)).toContain('limit $3 offset $4');
    expect(params).toEqual(['A', '2025-06', 100, 0]);
  });

  it('reports zero total sales for a period without data', async () => {
    const db = fakeClient();
    db.query.mockResolvedValueOnce({ rows: [{ total: null }], rowCount: 1 });

    const total = await createPgSalesQueries(db).totalSales(JUNE);

    expect(total).toBe(0);
    expect(db.query.mock.calls[0]).toEqual(['select sum(total) as total from customer_period where period = $1', ['2025-06']]);
  });
});
