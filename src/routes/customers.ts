import { Router } from 'express';
import { z } from 'zod';
import { notFound } from '../errors.js';
import type { SalesQueries } from '../services/sales-queries.js';
import { asyncHandler } from '../utils/async-handler.js';
import { optionalText, pagingSchema, periodParam } from './query-params.js';

const listQuerySchema = pagingSchema(500, 100).extend({
  salesman: optionalText,
  code: optionalText,
});

const brandsQuerySchema = pagingSchema(500, 500).extend({
  period: periodParam,
});

const idParamsSchema = z.object({
  id: z.string().uuid(),
});

export function createCustomersRouter(queries: SalesQueries): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const filter = listQuerySchema.parse(req.query);
      res.json(await queries.listCustomers(filter));
    })
  );

  router.get(
    '/:id/brands',
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const { period, offset, limit } = brandsQuerySchema.parse(req.query);
      const customer = await queries.findCustomer(id);
      if (!customer) {
        throw notFound('customer not found');
      }
      const facts = await queries.listFacts({ customerCode: customer.code, period, offset, limit });
      res.json(facts);
    })
  );

  return router;
}
