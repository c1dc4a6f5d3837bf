import { Router } from 'express';
import { z } from 'zod';
import type { SalesQueries } from '../services/sales-queries.js';
import { asyncHandler } from '../utils/async-handler.js';
import { booleanParam, optionalText, pagingSchema, periodParam } from './query-params.js';

const brandsQuerySchema = pagingSchema(500, 100).extend({
  period: periodParam,
  aggregate: booleanParam,
});

const factsQuerySchema = pagingSchema(500, 100).extend({
  customer_code: optionalText,
  brand: optionalText,
  period: periodParam,
});

const periodQuerySchema = z.object({
  period: periodParam,
});

const topQuerySchema = z.object({
  period: periodParam,
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export function createReportsRouter(queries: SalesQueries): Router {
  const router = Router();

  router.get(
    '/brands',
    asyncHandler(async (req, res) => {
      const { period, aggregate = true, offset, limit } = brandsQuerySchema.parse(req.query);
      if (aggregate) {
        res.json(await queries.brandTotals({ period, offset, limit }));
        return;
      }
      res.json(await queries.listFacts({ period, offset, limit }));
    })
  );

  router.get(
    '/facts',
    asyncHandler(async (req, res) => {
      const { customer_code: customerCode, brand, period, offset, limit } = factsQuerySchema.parse(req.query);
      res.json(await queries.listFacts({ customerCode, brand, period, offset, limit }));
    })
  );

  router.get(
    '/summary/total-sales',
    asyncHandler(async (req, res) => {
      const { period } = periodQuerySchema.parse(req.query);
      const total = await queries.totalSales(period);
      res.json({ period: period ?? null, total_sales: total });
    })
  );

  router.get(
    '/top-customers',
    asyncHandler(async (req, res) => {
      const { period, limit } = topQuerySchema.parse(req.query);
      res.json(await queries.topCustomers(limit, period));
    })
  );

  router.get(
    '/top-brands',
    asyncHandler(async (req, res) => {
      const { period, limit } = topQuerySchema.parse(req.query);
      res.json(await queries.brandTotals({ period, offset: 0, limit }));
    })
  );

  return router;
}
