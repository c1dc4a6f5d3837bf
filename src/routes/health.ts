import { Router } from 'express';
import type { SalesQueries } from '../services/sales-queries.js';
import { asyncHandler } from '../utils/async-handler.js';

export function createHealthRouter(queries: SalesQueries): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const time = await queries.now();
      res.json({ status: 'ok', time });
    })
  );

  return router;
}
